import pino from 'pino';
import type { Logger } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

/**
 * Build the run's logger. Entry points own it and hand it to each
 * component; nothing in the core creates its own.
 *
 * Logs go to stderr so CSV/JSON on stdout stays pipeable.
 */
export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL'>): Logger {
  return pino(
    { name: 'edgar-13f-holdings', level: config.LOG_LEVEL },
    pino.destination(2)
  );
}
