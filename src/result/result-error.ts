import type { ConfigValidationError } from '../errors/config-validation-error.js';

const CODE_PREFIX = 'VALIDATION_';

/**
 * A validation failure in railway form: a deterministic code plus the
 * rule's message, verbatim.
 */
export type ResultError = Readonly<{
  readonly _tag: 'ConfigValidationFailed';
  readonly code: string;
  readonly message: string;
}>;

/**
 * `Database.ConnectionString` → `VALIDATION_DATABASE_CONNECTIONSTRING`.
 * Only `.` separators are rewritten; `:` in section keys is kept as-is.
 */
export function toErrorCode(key: string): string {
  return `${CODE_PREFIX}${key.replace(/\./g, '_').toUpperCase()}`;
}

export function toResultError(error: ConfigValidationError): ResultError {
  return {
    _tag: 'ConfigValidationFailed',
    code: toErrorCode(error.key),
    message: error.message,
  };
}

export function toResultErrors(errors: Iterable<ConfigValidationError>): readonly ResultError[] {
  return Array.from(errors, toResultError);
}
