import type { Point } from './geometry.js';

export type Direction = 'up' | 'down' | 'left' | 'right';

export const INITIAL_DIRECTION: Direction = 'up';

/** Turn taken after stepping on a foreground pixel. */
export const COUNTERCLOCKWISE: Readonly<Record<Direction, Direction>> = {
  up: 'left',
  left: 'down',
  down: 'right',
  right: 'up',
};

/** Turn taken after stepping on a clear pixel. */
export const CLOCKWISE: Readonly<Record<Direction, Direction>> = {
  up: 'right',
  right: 'down',
  down: 'left',
  left: 'up',
};

export const STEP: Readonly<Record<Direction, Point>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function turn(direction: Direction, onForeground: boolean): Direction {
  return onForeground ? COUNTERCLOCKWISE[direction] : CLOCKWISE[direction];
}

export function advance(position: Point, direction: Direction): Point {
  const step = STEP[direction];
  return { x: position.x + step.x, y: position.y + step.y };
}
