import pino from 'pino';
import type { Logger } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { parseLogLevel } from '../../config/app-config.js';

/**
 * Logger for code that runs before (or without) the DI container:
 * builders created directly by callers, and the container bootstrap itself.
 *
 * After DI is ready, prefer the injected ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: parseLogLevel(process.env['CONFIGKIT_LOG_LEVEL']),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
