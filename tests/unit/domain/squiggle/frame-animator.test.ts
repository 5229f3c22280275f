import { describe, expect, it } from 'vitest';

import {
  animateShapes,
  type AnimationParameters,
  createSeededRandom,
  DEFAULT_ANIMATION_PARAMETERS,
  perturbShape,
  pickDroppedIndices,
  type Point,
  type ShapeList,
} from '@domain/squiggle/index.js';
import { ErrorCode } from '@/shared/errors/app-error.js';

import { catchError, points } from '../../../support/rasters.js';

const line = (length: number): Point[] => Array.from({ length }, (_, x) => ({ x: x * 3, y: 10 }));

const still: AnimationParameters = { sloppiness: 0, shakiness: 0, shakyFrequency: 1, frameCount: 3 };

describe('animateShapes', () => {
  it('produces frameCount frames holding every shape', () => {
    const shapes: ShapeList = [line(4), line(6)];

    const frames = animateShapes(shapes, still, createSeededRandom(1));

    expect(frames).toHaveLength(3);
    expect(frames.every((frame) => frame.length === 2)).toBe(true);
  });

  it('copies shapes exactly without sloppiness or shakiness', () => {
    const shapes: ShapeList = [line(5)];

    const frames = animateShapes(shapes, still, createSeededRandom(3));

    expect(frames).toEqual([shapes, shapes, shapes]);
  });

  it('drops floor(sloppiness * n) points per shape', () => {
    const parameters = { sloppiness: 0.25, shakiness: 0, shakyFrequency: 1, frameCount: 4 };

    const frames = animateShapes([line(10), line(3)], parameters, createSeededRandom(11));

    for (const frame of frames) {
      expect(frame.map((shape) => shape.length)).toEqual([8, 3]);
    }
  });

  it('empties shapes at full sloppiness', () => {
    const parameters = { sloppiness: 1, shakiness: 1, shakyFrequency: 1, frameCount: 2 };

    expect(animateShapes([line(7)], parameters, createSeededRandom(5))).toEqual([[[]], [[]]]);
  });

  it('keeps surviving points in their original order', () => {
    const shape = line(20);
    const parameters = { sloppiness: 0.5, shakiness: 0, shakyFrequency: 1, frameCount: 5 };

    for (const [kept] of animateShapes([shape], parameters, createSeededRandom(8))) {
      const positions = (kept ?? []).map((point) => shape.findIndex((candidate) => candidate.x === point.x));
      expect(positions).toEqual([...positions].sort((a, b) => a - b));
      expect(positions).not.toContain(-1);
    }
  });

  it('bounds jitter by shakiness on each axis', () => {
    const shape = line(30);
    const parameters = { sloppiness: 0, shakiness: 2, shakyFrequency: 1, frameCount: 6 };

    for (const [jittered] of animateShapes([shape], parameters, createSeededRandom(21))) {
      expect(jittered).toHaveLength(shape.length);
      (jittered ?? []).forEach((point, index) => {
        const original = shape[index] ?? { x: Number.NaN, y: Number.NaN };
        expect(Math.abs(point.x - original.x)).toBeLessThanOrEqual(2);
        expect(Math.abs(point.y - original.y)).toBeLessThanOrEqual(2);
      });
    }
  });

  it('is deterministic for equal seeds', () => {
    const shapes: ShapeList = [line(25), line(12)];

    const first = animateShapes(shapes, DEFAULT_ANIMATION_PARAMETERS, createSeededRandom(42));
    const second = animateShapes(shapes, DEFAULT_ANIMATION_PARAMETERS, createSeededRandom(42));

    expect(first).toEqual(second);
  });

  it('never modifies the input shapes', () => {
    const shapes: ShapeList = [line(15)];
    const before = structuredClone(shapes);

    animateShapes(shapes, { sloppiness: 0.4, shakiness: 3, shakyFrequency: 1, frameCount: 4 });

    expect(shapes).toEqual(before);
  });

  it('returns no frames for a frame count of zero', () => {
    expect(animateShapes([line(3)], { ...still, frameCount: 0 })).toEqual([]);
  });

  it('treats shaky frequencies above 1 as always jittering', () => {
    const parameters = { sloppiness: 0, shakiness: 1, shakyFrequency: 4, frameCount: 1 };

    expect(animateShapes([points([5, 5])], parameters, () => 0)).toEqual([[points([4, 4])]]);
  });

  const invalid: Array<[string, Partial<AnimationParameters>]> = [
    ['sloppiness', { sloppiness: 1.5 }],
    ['sloppiness', { sloppiness: -0.1 }],
    ['shakiness', { shakiness: 0.5 }],
    ['shakiness', { shakiness: -1 }],
    ['shakyFrequency', { shakyFrequency: 0 }],
    ['frameCount', { frameCount: -2 }],
    ['frameCount', { frameCount: 1.5 }],
  ];

  it.each(invalid)('rejects an invalid %s', (parameter, override) => {
    const error = catchError(() => animateShapes([line(3)], { ...DEFAULT_ANIMATION_PARAMETERS, ...override }));

    expect(error).toMatchObject({ code: ErrorCode.InvalidParameter, metadata: { parameter } });
  });
});

describe('perturbShape', () => {
  it('shifts a point by the lowest offset when the random source returns 0', () => {
    const parameters = { sloppiness: 0, shakiness: 1, shakyFrequency: 0.5, frameCount: 1 };

    expect(perturbShape(points([5, 5], [6, 5]), parameters, () => 0)).toEqual(points([4, 4], [5, 4]));
  });

  it('leaves points alone when the jitter roll misses', () => {
    const parameters = { sloppiness: 0, shakiness: 1, shakyFrequency: 0.5, frameCount: 1 };

    expect(perturbShape(points([5, 5], [6, 5]), parameters, () => 0.75)).toEqual(points([5, 5], [6, 5]));
  });

  it('returns fresh point objects', () => {
    const shape = points([1, 1]);
    const [copy] = perturbShape(shape, still, () => 0.5);

    expect(copy).toEqual(shape[0]);
    expect(copy).not.toBe(shape[0]);
  });
});

describe('pickDroppedIndices', () => {
  it('takes the leading indices when the random source returns 0', () => {
    expect(pickDroppedIndices(5, 2, () => 0)).toEqual(new Set([0, 1]));
  });

  it('swaps from the tail when the random source is near 1', () => {
    expect(pickDroppedIndices(5, 2, () => 0.99)).toEqual(new Set([4, 0]));
  });

  it('never picks more indices than exist', () => {
    expect(pickDroppedIndices(3, 10, createSeededRandom(9)).size).toBe(3);
  });

  it('picks nothing for a zero count', () => {
    expect(pickDroppedIndices(4, 0, () => 0.3).size).toBe(0);
  });
});
