import 'reflect-metadata';
import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';

/**
 * Root pino logger:
 * - sync output to stderr, so stdout stays free for the host application
 * - JSON lines with ISO timestamps
 * - redaction of validated values and secret-looking fields
 */
function createRootLogger(config: ValidatedConfig): Logger {
  return pino(
    {
      level: config.logging.level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
