import type { SquiggleImagePayload } from '../application/squiggle/index.js';

export const USAGE =
  'Usage: squiggle-gif <input image> <output gif> [--sloppiness 0.1] [--shakiness 1] ' +
  '[--shaky-frequency 0.25] [--frames 5] [--delay 100] [--blot 1] [--seed <int>] [--outline]';

export class UsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface MutableOptions {
  sloppiness?: number;
  shakiness?: number;
  shakyFrequency?: number;
  frameCount?: number;
  frameDelayMs?: number;
  blotRadius?: number;
  seed?: number;
  outline: boolean;
}

function readNumber(flag: string, value: string | undefined): number {
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Missing value for ${flag}`);
  }

  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`Invalid number for ${flag}: ${value}`);
  }

  return parsed;
}

/**
 * Two positionals (input, output) plus optional tuning flags. Values are only
 * checked for being numbers here; ranges are enforced by the command schema.
 */
export function parseCliArguments(argv: readonly string[], defaultSeed?: number): SquiggleImagePayload {
  const positionals: string[] = [];
  const options: MutableOptions = { outline: false, seed: defaultSeed };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const next = argv[i + 1];
    switch (arg) {
      case '--sloppiness':
        options.sloppiness = readNumber(arg, next);
        i += 1;
        break;
      case '--shakiness':
        options.shakiness = readNumber(arg, next);
        i += 1;
        break;
      case '--shaky-frequency':
        options.shakyFrequency = readNumber(arg, next);
        i += 1;
        break;
      case '--frames':
        options.frameCount = readNumber(arg, next);
        i += 1;
        break;
      case '--delay':
        options.frameDelayMs = readNumber(arg, next);
        i += 1;
        break;
      case '--blot':
        options.blotRadius = readNumber(arg, next);
        i += 1;
        break;
      case '--seed':
        options.seed = readNumber(arg, next);
        i += 1;
        break;
      case '--outline':
        options.outline = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  const [inputPath, outputPath, ...extra] = positionals;
  if (!inputPath || !outputPath) {
    throw new UsageError('Missing input or output path');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra[0]}`);
  }

  return {
    inputPath,
    outputPath,
    tracing: { blotRadius: options.blotRadius },
    animation: {
      sloppiness: options.sloppiness,
      shakiness: options.shakiness,
      shakyFrequency: options.shakyFrequency,
      frameCount: options.frameCount,
      seed: options.seed,
    },
    output: {
      frameDelayMs: options.frameDelayMs,
      drawMode: options.outline ? 'outline' : 'fill',
    },
  };
}
