import { AppError } from '../../../shared/errors/app-error.js';
import { type ColorIndex, IndexedRaster } from '../value-objects/raster.js';

export const DEFAULT_BLOT_RADIUS = 1;

/**
 * Blots every non-clear pixel into the square of half-width `blotRadius`
 * around it, closing gaps in thin line art. Returns a new raster; the source
 * is left untouched.
 */
export function erode(
  raster: IndexedRaster,
  clearColor: ColorIndex,
  blotRadius: number = DEFAULT_BLOT_RADIUS,
): IndexedRaster {
  if (!Number.isInteger(blotRadius) || blotRadius < 0) {
    throw AppError.invalidParameter('blotRadius', 'Blot radius must be a non-negative integer', {
      blotRadius,
    });
  }

  const { width, height } = raster;
  const eroded = IndexedRaster.filled(width, height, raster.palette, clearColor);

  for (let x = 0; x < width; x += 1) {
    for (let y = 0; y < height; y += 1) {
      const color = raster.colorAt(x, y);
      if (color === clearColor) {
        continue;
      }

      const left = Math.max(0, x - blotRadius);
      const right = Math.min(width - 1, x + blotRadius);
      const top = Math.max(0, y - blotRadius);
      const bottom = Math.min(height - 1, y + blotRadius);

      for (let bx = left; bx <= right; bx += 1) {
        for (let by = top; by <= bottom; by += 1) {
          eroded.setColor(bx, by, color);
        }
      }
    }
  }

  return eroded;
}
