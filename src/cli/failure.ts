import { AppError } from '../shared/errors/app-error.js';

export const INTERNAL_FAILURE_MESSAGE = 'Squiggle rendering failed; see the log for details.';

/** One-line `[code] message` report; unexposed messages stay in the log. */
export function describeFailure(error: unknown): string {
  const appError = AppError.fromUnknown(error);
  const message = appError.exposeMessage ? appError.message : INTERNAL_FAILURE_MESSAGE;
  return `[${appError.code}] ${message}`;
}
