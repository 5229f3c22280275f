export * from './application/squiggle/index.js';
export * from './domain/squiggle/index.js';
export * from './infrastructure/squiggle/index.js';
export { AppError, ErrorCode } from './shared/errors/app-error.js';
export { SquiggleError } from './shared/errors/base.error.js';
