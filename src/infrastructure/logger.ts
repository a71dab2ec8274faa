import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

/**
 * Default logger for dispatchers created without one.
 * Level comes from LOG_LEVEL.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'ntfy-dispatch',
    level: process.env['LOG_LEVEL'] ?? 'info',
    ...options,
  });
}
