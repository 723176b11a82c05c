import type { Brand } from '../runtime/brand.js';
import type { ConfigValidationError } from './config-validation-error.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

/** The library's own environment settings failed to parse. */
export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** One or more registered sections produced rule failures at startup. */
export type StartupValidationFailedError = Readonly<{
  readonly _tag: 'StartupValidationFailed';
  readonly sections: readonly string[];
  readonly errors: readonly ConfigValidationError[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | StartupValidationFailedError | UnexpectedError;

/**
 * Branded config value: proves `loadConfig` produced it.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
