import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { createCanvas } from '@napi-rs/canvas';

import { SquiggleImageCommand, SquiggleImageHandler } from '../../src/application/squiggle/index.js';
import {
  CanvasFrameRenderer,
  GifAnimationEncoder,
  ImageRasterSource,
} from '../../src/infrastructure/squiggle/index.js';

async function drawSample(directory: string): Promise<string> {
  const canvas = createCanvas(160, 120);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = '#ffffff';
  ctx.fillRect(0, 0, 160, 120);
  ctx.fillStyle = '#000000';

  // axis-aligned fills keep the drawing free of antialiased greys
  ctx.fillRect(20, 30, 50, 2);
  ctx.fillRect(20, 88, 50, 2);
  ctx.fillRect(20, 30, 2, 60);
  ctx.fillRect(68, 30, 2, 60);
  for (let step = 0; step < 40; step += 1) {
    ctx.fillRect(95 + step, 30 + step, 3, 3);
  }

  const samplePath = path.join(directory, 'sample.png');
  await writeFile(samplePath, canvas.toBuffer('image/png'));
  return samplePath;
}

async function main() {
  const workDir = await mkdtemp(path.join(os.tmpdir(), 'squiggle-example-'));
  const inputPath = await drawSample(workDir);
  const outputPath = path.resolve(process.argv[2] ?? 'squiggle-example.gif');

  const handler = new SquiggleImageHandler({
    rasterSource: new ImageRasterSource(),
    renderer: new CanvasFrameRenderer(),
    encoder: new GifAnimationEncoder(),
  });

  const outcome = await handler.execute(
    new SquiggleImageCommand({
      inputPath,
      outputPath,
      animation: { frameCount: 8, seed: 7 },
      output: { drawMode: 'outline' },
    }),
  );

  console.log('Squiggle metrics', outcome.metrics);
  console.log(`Wrote ${outcome.outputPath}`);
}

main().catch((error) => {
  console.error('Failed to render sample squiggle', error);
  process.exitCode = 1;
});
