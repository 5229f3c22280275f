import { AppError } from '../../../shared/errors/app-error.js';

export interface AnimationParameters {
  /** Fraction of each shape's points dropped per frame, in [0, 1]. */
  readonly sloppiness: number;
  /** Largest per-axis jitter in pixels. */
  readonly shakiness: number;
  /** Chance that a kept point is jittered; values above 1 behave as 1. */
  readonly shakyFrequency: number;
  readonly frameCount: number;
}

export const DEFAULT_ANIMATION_PARAMETERS: AnimationParameters = {
  sloppiness: 0.1,
  shakiness: 1,
  shakyFrequency: 0.25,
  frameCount: 5,
};

export function assertAnimationParameters(parameters: AnimationParameters): void {
  const { sloppiness, shakiness, shakyFrequency, frameCount } = parameters;

  if (!Number.isFinite(sloppiness) || sloppiness < 0 || sloppiness > 1) {
    throw AppError.invalidParameter('sloppiness', 'Sloppiness must be between 0 and 1', { sloppiness });
  }

  if (!Number.isInteger(shakiness) || shakiness < 0) {
    throw AppError.invalidParameter('shakiness', 'Shakiness must be a non-negative integer', { shakiness });
  }

  if (!Number.isFinite(shakyFrequency) || shakyFrequency <= 0) {
    throw AppError.invalidParameter('shakyFrequency', 'Shaky frequency must be greater than 0', {
      shakyFrequency,
    });
  }

  if (!Number.isInteger(frameCount) || frameCount < 0) {
    throw AppError.invalidParameter('frameCount', 'Frame count must be a non-negative integer', {
      frameCount,
    });
  }
}
