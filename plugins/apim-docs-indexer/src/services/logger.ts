import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Root logger for a pipeline run. Stages receive it (or a child) through
 * their constructors; nothing in the package logs through a module global.
 */
export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: options.name ?? 'apim-docs',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    formatters: {
      level: label => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
