import type { Point } from '../value-objects/geometry.js';
import type { ColorIndex, IndexedRaster } from '../value-objects/raster.js';

/**
 * First non-clear pixel scanning rows bottom to top, each row right to left.
 * The order decides which region is traced first and must not change.
 */
export function locateShape(raster: IndexedRaster, clearColor: ColorIndex): Point | undefined {
  for (let y = raster.height - 1; y >= 0; y -= 1) {
    for (let x = raster.width - 1; x >= 0; x -= 1) {
      if (raster.colorAt(x, y) !== clearColor) {
        return { x, y };
      }
    }
  }

  return undefined;
}
