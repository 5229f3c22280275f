import pino, { type Logger } from 'pino';

import { environment } from '../config/environment.js';

export const logger: Logger = pino({
  name: 'squiggle-gif',
  level: environment.LOG_LEVEL,
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
