import { describe, expect, it } from 'vitest';

import {
  advance,
  CLOCKWISE,
  COUNTERCLOCKWISE,
  type Direction,
  INITIAL_DIRECTION,
  turn,
} from '@domain/squiggle/index.js';

const DIRECTIONS: Direction[] = ['up', 'right', 'down', 'left'];

describe('direction tables', () => {
  it('starts facing up', () => {
    expect(INITIAL_DIRECTION).toBe('up');
  });

  it('rotates counterclockwise on foreground and clockwise on clear pixels', () => {
    expect(turn('up', true)).toBe('left');
    expect(turn('left', true)).toBe('down');
    expect(turn('down', true)).toBe('right');
    expect(turn('right', true)).toBe('up');

    expect(turn('up', false)).toBe('right');
    expect(turn('right', false)).toBe('down');
    expect(turn('down', false)).toBe('left');
    expect(turn('left', false)).toBe('up');
  });

  it('uses mutually inverse rotation tables', () => {
    for (const direction of DIRECTIONS) {
      expect(CLOCKWISE[COUNTERCLOCKWISE[direction]]).toBe(direction);
      expect(COUNTERCLOCKWISE[CLOCKWISE[direction]]).toBe(direction);
    }
  });

  it('returns to the same heading after four turns', () => {
    for (const direction of DIRECTIONS) {
      let heading = direction;
      for (let i = 0; i < 4; i += 1) {
        heading = CLOCKWISE[heading];
      }
      expect(heading).toBe(direction);
    }
  });

  it('moves one pixel with y growing downwards', () => {
    const origin = { x: 4, y: 4 };
    expect(advance(origin, 'up')).toEqual({ x: 4, y: 3 });
    expect(advance(origin, 'down')).toEqual({ x: 4, y: 5 });
    expect(advance(origin, 'left')).toEqual({ x: 3, y: 4 });
    expect(advance(origin, 'right')).toEqual({ x: 5, y: 4 });
  });
});
