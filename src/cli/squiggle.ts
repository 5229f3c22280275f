#!/usr/bin/env node
import {
  SquiggleImageCommand,
  SquiggleImageHandler,
  type SquiggleImagePayload,
} from '../application/squiggle/index.js';
import {
  CanvasFrameRenderer,
  GifAnimationEncoder,
  ImageRasterSource,
} from '../infrastructure/squiggle/index.js';
import { environment } from '../shared/config/environment.js';

import { parseCliArguments, USAGE, UsageError } from './arguments.js';
import { describeFailure } from './failure.js';

function readPayload(argv: readonly string[]): SquiggleImagePayload | undefined {
  try {
    return parseCliArguments(argv, environment.SQUIGGLE_SEED);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return undefined;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const payload = readPayload(process.argv.slice(2));
  if (!payload) {
    return 1;
  }

  const handler = new SquiggleImageHandler({
    rasterSource: new ImageRasterSource(),
    renderer: new CanvasFrameRenderer(),
    encoder: new GifAnimationEncoder(),
  });

  const outcome = await handler.execute(new SquiggleImageCommand(payload));
  console.log(
    `Wrote ${outcome.frameCount} frames (${outcome.shapeCount} shapes) to ${outcome.outputPath}`,
  );
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(describeFailure(error));
    process.exitCode = 1;
  });
