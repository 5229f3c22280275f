import { advance, type Direction, INITIAL_DIRECTION, turn } from '../value-objects/direction.js';
import type { Point, Shape } from '../value-objects/geometry.js';
import type { ColorIndex, IndexedRaster } from '../value-objects/raster.js';

export interface ContourTrace {
  readonly shape: Shape;
  /** False when the walk left the raster before getting back to the start. */
  readonly closed: boolean;
}

/**
 * Square-tracing walk around the region containing `start`.
 *
 * Each step reads the pixel under the tracer, records it and turns
 * counterclockwise if it is foreground, otherwise turns clockwise, then moves
 * one pixel. The walk stops on returning to `start` or on leaving the raster.
 * Read, turn, move must stay in that order: any other order yields a different
 * outline.
 */
export function traceContour(raster: IndexedRaster, clearColor: ColorIndex, start: Point): ContourTrace {
  const shape: Point[] = [];
  let position: Point = start;
  let direction: Direction = INITIAL_DIRECTION;

  for (;;) {
    const onForeground = raster.colorAt(position.x, position.y) !== clearColor;
    if (onForeground) {
      shape.push(position);
    }

    direction = turn(direction, onForeground);
    position = advance(position, direction);

    if (!raster.contains(position.x, position.y)) {
      return { shape, closed: false };
    }

    if (position.x === start.x && position.y === start.y) {
      return { shape, closed: true };
    }
  }
}

export function traceShape(raster: IndexedRaster, clearColor: ColorIndex, start: Point): Shape {
  return traceContour(raster, clearColor, start).shape;
}
