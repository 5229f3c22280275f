import { SquiggleError } from './base.error.js';

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export const ErrorCode = {
  Decode: 'raster.decode-failed',
  NoClearColor: 'raster.no-clear-color',
  MalformedRaster: 'raster.malformed',
  InvalidParameter: 'animation.invalid-parameter',
  Encode: 'animation.encode-failed',
  Unexpected: 'squiggle.failure',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class AppError extends SquiggleError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
  }

  public static fromUnknown(error: unknown, code: string = ErrorCode.Unexpected): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, cause, exposeMessage: false });
  }

  public static validation(code: string, metadata: Record<string, unknown>): AppError {
    return new AppError({
      code,
      message: 'Validation failed for the provided payload.',
      metadata,
      exposeMessage: true,
    });
  }

  public static invalidParameter(
    parameter: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({
      code: ErrorCode.InvalidParameter,
      message,
      metadata: { parameter, ...metadata },
      exposeMessage: true,
    });
  }

  public static decode(message: string, metadata?: Record<string, unknown>, cause?: unknown): AppError {
    return new AppError({
      code: ErrorCode.Decode,
      message,
      metadata,
      cause,
      exposeMessage: true,
    });
  }

  public static noClearColor(color: { r: number; g: number; b: number }): AppError {
    return new AppError({
      code: ErrorCode.NoClearColor,
      message: `Clear color rgb(${color.r}, ${color.g}, ${color.b}) does not occur in the image.`,
      metadata: { color },
      exposeMessage: true,
    });
  }

  public static malformedRaster(message: string, metadata?: Record<string, unknown>): AppError {
    return new AppError({
      code: ErrorCode.MalformedRaster,
      message,
      metadata,
      exposeMessage: false,
    });
  }

  public static encode(message: string, metadata?: Record<string, unknown>, cause?: unknown): AppError {
    return new AppError({
      code: ErrorCode.Encode,
      message,
      metadata,
      cause,
      exposeMessage: false,
    });
  }
}
