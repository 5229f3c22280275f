import { createCanvas } from '@napi-rs/canvas';

import {
  type FrameRenderer,
  IndexedRaster,
  type RenderFrameRequest,
  type RgbColor,
} from '../../../domain/squiggle/index.js';

export const MIN_POLYGON_POINTS = 3;

const BACKGROUND_INDEX = 0;
const INK_INDEX = 1;

const toCss = ({ r, g, b }: RgbColor): string => `rgb(${r}, ${g}, ${b})`;

const distanceSquared = (data: Uint8ClampedArray, offset: number, color: RgbColor): number => {
  const dr = (data[offset] ?? 0) - color.r;
  const dg = (data[offset + 1] ?? 0) - color.g;
  const db = (data[offset + 2] ?? 0) - color.b;
  return dr * dr + dg * dg + db * db;
};

/**
 * Draws frames with the canvas path API and snaps the antialiased result back
 * to a two-color palette, `[background, ink]`.
 */
export class CanvasFrameRenderer implements FrameRenderer {
  public renderFrame(request: RenderFrameRequest): IndexedRaster {
    const { width, height, shapes, inkColor, backgroundColor, drawMode } = request;
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');

    ctx.fillStyle = toCss(backgroundColor);
    ctx.fillRect(0, 0, width, height);
    ctx.fillStyle = toCss(inkColor);
    ctx.strokeStyle = toCss(inkColor);
    ctx.lineWidth = 1;

    for (const shape of shapes) {
      if (shape.length < MIN_POLYGON_POINTS) {
        continue;
      }

      ctx.beginPath();
      shape.forEach((point, index) => {
        // pixel centres
        const x = point.x + 0.5;
        const y = point.y + 0.5;
        if (index === 0) {
          ctx.moveTo(x, y);
        } else {
          ctx.lineTo(x, y);
        }
      });
      ctx.closePath();

      if (drawMode === 'fill') {
        ctx.fill();
      } else {
        ctx.stroke();
      }
    }

    const { data } = ctx.getImageData(0, 0, width, height);
    const indices = new Uint8Array(width * height);
    for (let pixel = 0; pixel < indices.length; pixel += 1) {
      const offset = pixel * 4;
      indices[pixel] =
        distanceSquared(data, offset, inkColor) < distanceSquared(data, offset, backgroundColor)
          ? INK_INDEX
          : BACKGROUND_INDEX;
    }

    return IndexedRaster.create(width, height, [backgroundColor, inkColor], indices);
  }
}
