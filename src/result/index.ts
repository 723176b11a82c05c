export type { ResultError } from './result-error.js';
export { toErrorCode, toResultError, toResultErrors } from './result-error.js';
export { configValidator, toResult, toErrorsResult, toValidationResult } from './config-validator.js';
