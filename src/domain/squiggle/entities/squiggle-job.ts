import { AppError } from '../../../shared/errors/app-error.js';
import type { DrawMode } from '../contracts/frame-renderer.js';
import {
  type AnimationParameters,
  assertAnimationParameters,
} from '../value-objects/animation-parameters.js';
import type { RgbColor } from '../value-objects/raster.js';

export interface TracingOptions {
  readonly blotRadius: number;
  readonly clearColor: RgbColor;
  readonly matte: RgbColor;
}

export interface SquiggleAnimationOptions extends AnimationParameters {
  readonly seed?: number;
}

export interface OutputOptions {
  readonly inkColor: RgbColor;
  readonly backgroundColor: RgbColor;
  readonly frameDelayMs: number;
  readonly loop: boolean;
  readonly drawMode: DrawMode;
}

export interface SquiggleJobProps {
  readonly id: string;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly tracing: TracingOptions;
  readonly animation: SquiggleAnimationOptions;
  readonly output: OutputOptions;
  readonly createdAt: Date;
}

export class SquiggleJob {
  public readonly id: string;

  public readonly inputPath: string;

  public readonly outputPath: string;

  public readonly tracing: TracingOptions;

  public readonly animation: SquiggleAnimationOptions;

  public readonly output: OutputOptions;

  public readonly createdAt: Date;

  private constructor(props: SquiggleJobProps) {
    this.id = props.id;
    this.inputPath = props.inputPath;
    this.outputPath = props.outputPath;
    this.tracing = props.tracing;
    this.animation = props.animation;
    this.output = props.output;
    this.createdAt = props.createdAt;
  }

  public static create(props: SquiggleJobProps): SquiggleJob {
    assertAnimationParameters(props.animation);

    if (!Number.isInteger(props.tracing.blotRadius) || props.tracing.blotRadius < 0) {
      throw AppError.invalidParameter('blotRadius', 'Blot radius must be a non-negative integer', {
        blotRadius: props.tracing.blotRadius,
      });
    }

    if (!Number.isFinite(props.output.frameDelayMs) || props.output.frameDelayMs <= 0) {
      throw AppError.invalidParameter('frameDelayMs', 'Frame delay must be positive', {
        frameDelayMs: props.output.frameDelayMs,
      });
    }

    return new SquiggleJob(props);
  }

  public get seeded(): boolean {
    return this.animation.seed !== undefined;
  }
}
