import 'reflect-metadata';
import { inject, singleton } from 'tsyringe';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { ValidatedConfig } from '../config/app-config.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { ConfigValidationError } from '../errors/config-validation-error.js';
import type { StartupValidationFailedError, UnexpectedError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import { ConfigValidationBuilder } from '../validation/config-validation-builder.js';

export type StartupError = StartupValidationFailedError | UnexpectedError;

interface SectionRegistration {
  readonly sectionName: string;
  readonly validate: () => Promise<readonly ConfigValidationError[]>;
}

/**
 * Collects configuration sections and validates all of them before the host
 * starts serving. Failures from every section are reported together.
 *
 * The instance to validate is produced by `load`, called at validation time,
 * so a reload-aware binder can hand over its latest snapshot.
 */
@singleton()
export class StartupValidator {
  private readonly registrations: SectionRegistration[] = [];
  private readonly logger: Logger;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Factory) private readonly loggerFactory: ILoggerFactory,
    @inject(DI.Runtime.ProcessTerminator) private readonly terminator: ProcessTerminator
  ) {
    this.logger = loggerFactory.create('StartupValidator');
  }

  get sectionNames(): readonly string[] {
    return this.registrations.map((r) => r.sectionName);
  }

  /**
   * New builder for `sectionName`, already registered, configured from the
   * library config (environment, URL timeout) and logging through the factory.
   */
  addSection<T extends object>(sectionName: string, load: () => T): ConfigValidationBuilder<T> {
    const builder = new ConfigValidationBuilder<T>(sectionName, {
      environment: this.config.environment,
      urlTimeoutMs: this.config.probes.urlTimeoutMs,
      logger: this.loggerFactory.create('ConfigValidationBuilder'),
    });
    this.register(builder, load);
    return builder;
  }

  /** Register a builder created elsewhere. */
  register<T extends object>(builder: ConfigValidationBuilder<T>, load: () => T): this {
    this.registrations.push({
      sectionName: builder.sectionName,
      validate: async () => builder.validate(load()),
    });
    return this;
  }

  /**
   * Validate every registered section in registration order.
   * A `load` or rule that throws is reported as `Unexpected`.
   */
  run(): ResultAsync<void, StartupError> {
    return ResultAsync.fromPromise(this.collect(), (cause) =>
      Err.unexpected('Startup validation could not complete', cause)
    ).andThen((errors): ResultAsync<void, StartupError> => {
      if (errors.length === 0) {
        this.logger.info({ sections: this.sectionNames }, 'Configuration validated');
        return okAsync(undefined);
      }

      for (const error of errors) {
        this.logger.error({ key: error.key, currentValue: error.currentValue }, error.message);
      }
      return errAsync(Err.startupValidationFailed(this.sectionNames, errors));
    });
  }

  /**
   * Run, and on any failure print every rendered error to stderr and
   * terminate the process with a failure code.
   */
  async validateOrExit(): Promise<void> {
    const result = await this.run();
    if (result.isOk()) return;

    this.logger.fatal({ error: result.error }, 'Configuration invalid, aborting startup');
    console.error(formatAppError(result.error));
    this.terminator.terminate({ kind: 'failure' });
  }

  private async collect(): Promise<readonly ConfigValidationError[]> {
    const all: ConfigValidationError[] = [];
    for (const registration of this.registrations) {
      all.push(...(await registration.validate()));
    }
    return all;
  }
}
