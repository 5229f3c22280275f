import {
  type AnimationParameters,
  assertAnimationParameters,
} from '../value-objects/animation-parameters.js';
import type { Animation, Frame, Point, Shape, ShapeList } from '../value-objects/geometry.js';
import { defaultRandom, type RandomSource, randomInt } from '../value-objects/random-source.js';

/**
 * Builds `frameCount` frames, each an independently perturbed copy of
 * `shapes`. The input list is never modified.
 */
export function animateShapes(
  shapes: ShapeList,
  parameters: AnimationParameters,
  random: RandomSource = defaultRandom,
): Animation {
  assertAnimationParameters(parameters);

  const frames: Frame[] = [];
  for (let index = 0; index < parameters.frameCount; index += 1) {
    frames.push(shapes.map((shape) => perturbShape(shape, parameters, random)));
  }

  return frames;
}

/** Drops `floor(sloppiness * n)` random points, then jitters the survivors. */
export function perturbShape(shape: Shape, parameters: AnimationParameters, random: RandomSource): Shape {
  const { sloppiness, shakiness, shakyFrequency } = parameters;
  const dropped = pickDroppedIndices(shape.length, Math.floor(sloppiness * shape.length), random);
  const jitterChance = Math.min(1, shakyFrequency);
  const result: Point[] = [];

  shape.forEach((point, index) => {
    if (dropped.has(index)) {
      return;
    }

    if (random() < jitterChance) {
      result.push({
        x: point.x + randomInt(random, -shakiness, shakiness),
        y: point.y + randomInt(random, -shakiness, shakiness),
      });
      return;
    }

    result.push({ x: point.x, y: point.y });
  });

  return result;
}

/** `count` distinct indices below `length`, via a partial Fisher-Yates shuffle. */
export function pickDroppedIndices(length: number, count: number, random: RandomSource): Set<number> {
  const take = Math.min(count, length);
  const indices = Array.from({ length }, (_, index) => index);

  for (let i = 0; i < take; i += 1) {
    const j = i + Math.floor(random() * (length - i));
    const swap = indices[j] ?? j;
    indices[j] = indices[i] ?? i;
    indices[i] = swap;
  }

  return new Set(indices.slice(0, take));
}
