import omggif from 'omggif';

import type {
  AnimationEncoder,
  AnimationEncodingOptions,
  IndexedRaster,
  RgbColor,
} from '../../../domain/squiggle/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

const MS_PER_GIF_DELAY_UNIT = 10;
const MAX_PALETTE_SIZE = 256;
const LOOP_FOREVER = 0;

// Worst case for one frame: control block, descriptor, local palette and
// uncompressed-size LZW output. The header fits in the same space.
const FRAME_OVERHEAD_BYTES = 1_024;
const WORST_CASE_BYTES_PER_PIXEL = 2;

const GIF_TRAILER = Buffer.from([0x3b]);

/** GIF palettes hold a power of two between 2 and 256 entries. */
export function toGifPalette(colors: readonly RgbColor[]): number[] {
  if (colors.length > MAX_PALETTE_SIZE) {
    throw AppError.encode('GIF frames support at most 256 colors', { colors: colors.length });
  }

  let size = 2;
  while (size < colors.length) {
    size *= 2;
  }

  const palette = colors.map(({ r, g, b }) => (r << 16) | (g << 8) | b);
  while (palette.length < size) {
    palette.push(0);
  }
  return palette;
}

export function toGifDelay(frameDelayMs: number): number {
  return Math.max(1, Math.round(frameDelayMs / MS_PER_GIF_DELAY_UNIT));
}

const samePalette = (a: readonly number[], b: readonly number[]): boolean =>
  a.length === b.length && a.every((value, index) => value === b[index]);

export class GifAnimationEncoder implements AnimationEncoder {
  public readonly mimeType = 'image/gif';

  private readonly logger = createChildLogger({ module: 'GifAnimationEncoder' });

  public async assembleAnimation(
    frames: readonly IndexedRaster[],
    options: AnimationEncodingOptions,
  ): Promise<Buffer> {
    const [first] = frames;
    if (!first) {
      throw AppError.encode('Cannot assemble an animation without frames');
    }

    const { width, height } = first;
    const mismatched = frames.findIndex((frame) => frame.width !== width || frame.height !== height);
    if (mismatched !== -1) {
      throw AppError.encode('All frames must share the same dimensions', { width, height, frame: mismatched });
    }

    const globalPalette = toGifPalette(first.palette);
    const delay = toGifDelay(options.frameDelayMs);
    const parts: Buffer[] = [];

    try {
      // One scratch buffer sized for a single frame; each chunk is copied out
      // before the write position is rewound for the next frame.
      const scratch = Buffer.alloc(FRAME_OVERHEAD_BYTES + width * height * WORST_CASE_BYTES_PER_PIXEL);
      const writer = new omggif.GifWriter(
        scratch,
        width,
        height,
        options.loop ? { palette: globalPalette, loop: LOOP_FOREVER } : { palette: globalPalette },
      );
      parts.push(Buffer.from(scratch.subarray(0, writer.getOutputBufferPosition())));

      for (const frame of frames) {
        const palette = toGifPalette(frame.palette);
        writer.setOutputBufferPosition(0);
        writer.addFrame(0, 0, width, height, Array.from(frame.toIndices()), {
          delay,
          ...(samePalette(palette, globalPalette) ? {} : { palette }),
        });
        parts.push(Buffer.from(scratch.subarray(0, writer.getOutputBufferPosition())));
      }
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw AppError.encode('GIF assembly failed', { width, height, frames: frames.length }, error);
    }

    parts.push(GIF_TRAILER);
    const gif = Buffer.concat(parts);

    this.logger.debug({ width, height, frames: frames.length, bytes: gif.byteLength, delay }, 'Assembled GIF animation');

    return gif;
  }
}
