import type { Shape, ShapeList } from '../value-objects/geometry.js';
import type { ColorIndex, IndexedRaster } from '../value-objects/raster.js';

import { traceShape } from './contour-tracer.js';
import { locateShape } from './shape-locator.js';

/**
 * Extracts every shape from `raster`, clearing each traced region so it is
 * never located twice. The raster is consumed: it is entirely `clearColor`
 * when this returns, so pass a copy you own (normally the eroded raster).
 */
export function traceAll(raster: IndexedRaster, clearColor: ColorIndex): ShapeList {
  const shapes: Shape[] = [];

  for (let start = locateShape(raster, clearColor); start; start = locateShape(raster, clearColor)) {
    shapes.push(traceShape(raster, clearColor, start));
    raster.fillRegion(start.x, start.y, clearColor);
  }

  return shapes;
}
