import { describe, expect, it } from 'vitest';

import { parseCliArguments, UsageError, USAGE } from '@/cli/arguments.js';
import { squiggleImageCommandSchema } from '@/application/squiggle/index.js';

describe('parseCliArguments', () => {
  it('leaves every option to its default when only paths are given', () => {
    const payload = parseCliArguments(['in.png', 'out.gif']);
    const request = squiggleImageCommandSchema.parse(payload);

    expect(request.inputPath).toBe('in.png');
    expect(request.outputPath).toBe('out.gif');
    expect(request.tracing.blotRadius).toBe(1);
    expect(request.animation).toEqual({ sloppiness: 0.1, shakiness: 1, shakyFrequency: 0.25, frameCount: 5 });
    expect(request.output.frameDelayMs).toBe(100);
    expect(request.output.drawMode).toBe('fill');
  });

  it('reads every tuning flag', () => {
    const payload = parseCliArguments([
      '--sloppiness',
      '0.3',
      'in.png',
      '--shakiness',
      '2',
      '--shaky-frequency',
      '0.5',
      '--frames',
      '8',
      '--delay',
      '40',
      '--blot',
      '0',
      '--seed',
      '-3',
      '--outline',
      'out.gif',
    ]);

    expect(payload).toEqual({
      inputPath: 'in.png',
      outputPath: 'out.gif',
      tracing: { blotRadius: 0 },
      animation: { sloppiness: 0.3, shakiness: 2, shakyFrequency: 0.5, frameCount: 8, seed: -3 },
      output: { frameDelayMs: 40, drawMode: 'outline' },
    });
  });

  it('falls back to the default seed', () => {
    expect(parseCliArguments(['a.png', 'b.gif'], 17).animation?.seed).toBe(17);
    expect(parseCliArguments(['a.png', 'b.gif', '--seed', '2'], 17).animation?.seed).toBe(2);
  });

  it('requires both paths', () => {
    expect(() => parseCliArguments(['in.png'])).toThrowError(new UsageError('Missing input or output path'));
  });

  it('rejects extra positionals', () => {
    expect(() => parseCliArguments(['a', 'b', 'c'])).toThrowError('Unexpected argument: c');
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArguments(['a', 'b', '--wobble'])).toThrowError('Unknown argument: --wobble');
  });

  it('rejects missing and non-numeric values', () => {
    expect(() => parseCliArguments(['a', 'b', '--frames'])).toThrowError('Missing value for --frames');
    expect(() => parseCliArguments(['a', 'b', '--frames', '--outline'])).toThrowError('Missing value for --frames');
    expect(() => parseCliArguments(['a', 'b', '--delay', 'soon'])).toThrowError('Invalid number for --delay: soon');
  });

  it('rejects numbers with trailing characters', () => {
    expect(() => parseCliArguments(['a', 'b', '--frames', '7px'])).toThrowError('Invalid number for --frames: 7px');
    expect(() => parseCliArguments(['a', 'b', '--shakiness', '3ms'])).toThrowError('Invalid number for --shakiness: 3ms');
    expect(() => parseCliArguments(['a', 'b', '--blot', ' '])).toThrowError('Invalid number for --blot:  ');
  });

  it('throws usage errors', () => {
    expect(() => parseCliArguments([])).toThrowError(UsageError);
    expect(USAGE).toContain('--shaky-frequency');
  });
});
