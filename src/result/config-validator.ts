import { ResultAsync, ok, err, type Result } from 'neverthrow';
import type { ConfigValidationError } from '../errors/config-validation-error.js';
import {
  ConfigValidationBuilder,
  type ValidationBuilderOptions,
} from '../validation/config-validation-builder.js';
import { toResultError, toResultErrors, type ResultError } from './result-error.js';

/**
 * Standalone builder, outside any startup registration:
 *
 *   const result = await toResult(configValidator<ApiConfig>('Api').notEmpty('baseUrl'), config);
 */
export function configValidator<T extends object>(
  sectionName: string,
  options?: ValidationBuilderOptions
): ConfigValidationBuilder<T> {
  return new ConfigValidationBuilder<T>(sectionName, options);
}

/**
 * `ok(options)` when every rule passes, otherwise the first failure.
 * Evaluation stops at the first failing rule.
 */
export function toResult<T extends object>(
  builder: ConfigValidationBuilder<T>,
  options: T
): ResultAsync<T, ResultError> {
  return ResultAsync.fromSafePromise(firstError(builder, options)).andThen(
    (first): Result<T, ResultError> => (first === null ? ok(options) : err(toResultError(first)))
  );
}

/** Like `toResult`, but carries every failure. */
export function toErrorsResult<T extends object>(
  builder: ConfigValidationBuilder<T>,
  options: T
): ResultAsync<T, readonly ResultError[]> {
  return ResultAsync.fromSafePromise(builder.validate(options)).andThen(
    (errors): Result<T, readonly ResultError[]> => (errors.length === 0 ? ok(options) : err(toResultErrors(errors)))
  );
}

/** Pass/fail only: the first failure, without the validated value. */
export function toValidationResult<T extends object>(
  builder: ConfigValidationBuilder<T>,
  options: T
): ResultAsync<void, ResultError> {
  return toResult(builder, options).map(() => undefined);
}

async function firstError<T extends object>(
  builder: ConfigValidationBuilder<T>,
  options: T
): Promise<ConfigValidationError | null> {
  for await (const error of builder.errors(options)) {
    return error;
  }
  return null;
}
