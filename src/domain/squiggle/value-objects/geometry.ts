export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Outline of one foreground region, in trace order. May be empty, and may be an
 * open polyline when the region touches the image border.
 */
export type Shape = readonly Point[];

export type ShapeList = readonly Shape[];

/** One perturbed copy of the shape list; same length and order as the source. */
export type Frame = readonly Shape[];

export type Animation = readonly Frame[];

export function countPoints(shapes: ShapeList): number {
  return shapes.reduce((total, shape) => total + shape.length, 0);
}
