import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import {
  type AnimationEncoder,
  animateShapes,
  countPoints,
  createSeededRandom,
  defaultRandom,
  erode,
  type FrameRenderer,
  type RasterSource,
  SquiggleJob,
  traceAll,
} from '../../../domain/squiggle/index.js';
import { AppError, ErrorCode } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { SquiggleImageCommand } from '../commands/squiggle-image.command.js';
import {
  squiggleImageCommandSchema,
  type SquiggleImagePayload,
  type SquiggleImageRequest,
} from '../dto/squiggle-image.dto.js';

export interface SquiggleImageHandlerDependencies {
  readonly rasterSource: RasterSource;
  readonly renderer: FrameRenderer;
  readonly encoder: AnimationEncoder;
}

export interface SquiggleMetrics {
  readonly decodeTimeMs: number;
  readonly traceTimeMs: number;
  readonly animateTimeMs: number;
  readonly renderTimeMs: number;
  readonly encodeTimeMs: number;
  readonly totalTimeMs: number;
  readonly outputSizeBytes: number;
}

export interface SquiggleOutcome {
  readonly jobId: string;
  readonly outputPath: string;
  readonly mimeType: string;
  readonly width: number;
  readonly height: number;
  readonly shapeCount: number;
  readonly pointCount: number;
  readonly frameCount: number;
  /** True when the frames came from a seeded, reproducible random source. */
  readonly seeded: boolean;
  readonly metrics: SquiggleMetrics;
}

export class SquiggleImageHandler {
  private readonly logger = createChildLogger({ module: 'SquiggleImageHandler' });

  public constructor(private readonly dependencies: SquiggleImageHandlerDependencies) {}

  public async execute(command: SquiggleImageCommand): Promise<SquiggleOutcome> {
    const request = this.validate(command.payload);
    const jobId = randomUUID();

    this.logger.info({ jobId, inputPath: request.inputPath }, 'Starting squiggle render');

    try {
      const job = SquiggleJob.create({
        id: jobId,
        inputPath: request.inputPath,
        outputPath: request.outputPath,
        tracing: request.tracing,
        animation: request.animation,
        output: request.output,
        createdAt: new Date(),
      });

      const outcome = await this.run(job);

      this.logger.info(
        {
          jobId,
          shapes: outcome.shapeCount,
          frames: outcome.frameCount,
          seeded: outcome.seeded,
          durationMs: outcome.metrics.totalTimeMs,
          outputSizeBytes: outcome.metrics.outputSizeBytes,
        },
        'Squiggle render completed',
      );

      return outcome;
    } catch (error) {
      const appError = AppError.fromUnknown(error, ErrorCode.Unexpected);
      this.logger.error({ jobId, error: appError.toJSON(), err: error }, 'Squiggle render failed');
      throw appError;
    }
  }

  private async run(job: SquiggleJob): Promise<SquiggleOutcome> {
    const { rasterSource, renderer, encoder } = this.dependencies;
    const startedAt = performance.now();

    const raster = await rasterSource.load(job.inputPath, { matte: job.tracing.matte });
    const decodeTimeMs = performance.now() - startedAt;

    const { clearColor } = job.tracing;
    const clear = raster.findClearColor(clearColor.r, clearColor.g, clearColor.b);
    if (clear === undefined) {
      throw AppError.noClearColor(clearColor);
    }

    const traceStarted = performance.now();
    const shapes = traceAll(erode(raster, clear, job.tracing.blotRadius), clear);
    const traceTimeMs = performance.now() - traceStarted;
    const pointCount = countPoints(shapes);

    this.logger.debug(
      { jobId: job.id, width: raster.width, height: raster.height, shapes: shapes.length, points: pointCount },
      'Traced shapes',
    );

    const animateStarted = performance.now();
    const { seed } = job.animation;
    const random = seed === undefined ? defaultRandom : createSeededRandom(seed);
    const animation = animateShapes(shapes, job.animation, random);
    const animateTimeMs = performance.now() - animateStarted;

    const renderStarted = performance.now();
    const frames = animation.map((frame) =>
      renderer.renderFrame({
        width: raster.width,
        height: raster.height,
        shapes: frame,
        inkColor: job.output.inkColor,
        backgroundColor: job.output.backgroundColor,
        drawMode: job.output.drawMode,
      }),
    );
    const renderTimeMs = performance.now() - renderStarted;

    const encodeStarted = performance.now();
    const gif = await encoder.assembleAnimation(frames, {
      frameDelayMs: job.output.frameDelayMs,
      loop: job.output.loop,
    });
    const encodeTimeMs = performance.now() - encodeStarted;

    const outputPath = path.resolve(job.outputPath);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, gif);

    return {
      jobId: job.id,
      outputPath,
      mimeType: encoder.mimeType,
      width: raster.width,
      height: raster.height,
      shapeCount: shapes.length,
      pointCount,
      frameCount: frames.length,
      seeded: job.seeded,
      metrics: {
        decodeTimeMs,
        traceTimeMs,
        animateTimeMs,
        renderTimeMs,
        encodeTimeMs,
        totalTimeMs: performance.now() - startedAt,
        outputSizeBytes: gif.byteLength,
      },
    };
  }

  private validate(payload: SquiggleImagePayload): SquiggleImageRequest {
    const parsed = squiggleImageCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation(ErrorCode.InvalidParameter, {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid squiggle payload received');
      throw error;
    }

    return parsed.data;
  }
}
