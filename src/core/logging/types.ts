import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's own Logger, no wrapper.
 *
 * Data-first call style:
 *   logger.info({ section: 'Database' }, 'Section validated');
 *   logger.error({ err: error }, 'Startup validation aborted');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
