import { promises as fs } from 'node:fs';

import { createCanvas, loadImage } from '@napi-rs/canvas';
import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';
import { PNG } from 'pngjs';

import {
  IndexedRaster,
  type RasterLoadOptions,
  type RasterSource,
} from '../../../domain/squiggle/index.js';
import { AppError, ErrorCode } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

export type ImageFormat = 'gif' | 'png' | 'other';

interface DecodedImage {
  readonly width: number;
  readonly height: number;
  readonly rgba: Uint8Array | Uint8ClampedArray;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function detectImageFormat(buffer: Buffer): ImageFormat {
  const magic = buffer.subarray(0, 6).toString('latin1');
  if (magic === 'GIF87a' || magic === 'GIF89a') {
    return 'gif';
  }

  if (buffer.length >= PNG_SIGNATURE.length && buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return 'png';
  }

  return 'other';
}

/**
 * Loads still images into indexed rasters. GIFs use their first frame; PNGs go
 * through pngjs; anything else (JPEG, WebP, ...) through the canvas decoder.
 */
export class ImageRasterSource implements RasterSource {
  private readonly logger = createChildLogger({ module: 'ImageRasterSource' });

  public async load(path: string, options: RasterLoadOptions = {}): Promise<IndexedRaster> {
    const buffer = await this.read(path);
    const format = detectImageFormat(buffer);

    let raster: IndexedRaster;
    try {
      const image = await this.decode(buffer, format);
      raster = IndexedRaster.fromRgba(image.width, image.height, image.rgba, options);
    } catch (error) {
      if (error instanceof AppError && error.code === ErrorCode.Decode) {
        throw error;
      }
      throw AppError.decode(`Unable to decode ${format} image at ${path}`, { path, format }, error);
    }

    this.logger.debug(
      { path, format, width: raster.width, height: raster.height, colors: raster.palette.length },
      'Decoded raster',
    );

    return raster;
  }

  private async read(path: string): Promise<Buffer> {
    try {
      return await fs.readFile(path);
    } catch (error) {
      throw AppError.decode(`Image at ${path} is not readable`, { path }, error);
    }
  }

  private async decode(buffer: Buffer, format: ImageFormat): Promise<DecodedImage> {
    switch (format) {
      case 'gif':
        return decodeGif(buffer);
      case 'png':
        return decodePng(buffer);
      case 'other':
        return decodeWithCanvas(buffer);
      default: {
        const exhaustive: never = format;
        throw AppError.decode('Unsupported image format', { format: exhaustive });
      }
    }
  }
}

function decodeGif(buffer: Buffer): DecodedImage {
  const arrayBuffer = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(arrayBuffer).set(buffer);
  const gif = parseGIF(arrayBuffer);
  const [first] = decompressFrames(gif, true);
  if (!first) {
    throw AppError.decode('GIF contains no image frames');
  }

  const { width, height } = gif.lsd;
  const rgba = new Uint8ClampedArray(width * height * 4);
  compositePatch(rgba, first, width, height);

  return { width, height, rgba };
}

function compositePatch(destination: Uint8ClampedArray, frame: ParsedFrame, width: number, height: number): void {
  const { top, left, width: patchWidth, height: patchHeight } = frame.dims;
  const { patch } = frame;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY >= height) {
      break;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      if (destX >= width) {
        break;
      }

      const patchIndex = (y * patchWidth + x) * 4;
      const destIndex = (destY * width + destX) * 4;
      destination[destIndex] = patch[patchIndex] ?? 0;
      destination[destIndex + 1] = patch[patchIndex + 1] ?? 0;
      destination[destIndex + 2] = patch[patchIndex + 2] ?? 0;
      destination[destIndex + 3] = patch[patchIndex + 3] ?? 0;
    }
  }
}

function decodePng(buffer: Buffer): DecodedImage {
  const png = PNG.sync.read(buffer);
  return { width: png.width, height: png.height, rgba: png.data };
}

async function decodeWithCanvas(buffer: Buffer): Promise<DecodedImage> {
  const image = await loadImage(buffer);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);
  const { data } = ctx.getImageData(0, 0, image.width, image.height);
  return { width: image.width, height: image.height, rgba: data };
}
