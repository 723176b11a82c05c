import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  StartupValidationFailedError,
  UnexpectedError,
} from './app-error.js';
import type { ConfigValidationError } from './config-validation-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configkit environment settings',
  }),

  startupValidationFailed: (
    sections: readonly string[],
    errors: readonly ConfigValidationError[]
  ): StartupValidationFailedError => ({
    _tag: 'StartupValidationFailed',
    sections,
    errors,
    message: `Configuration validation failed with ${errors.length} error(s)`,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
