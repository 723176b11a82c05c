export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  StartupValidationFailedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export type { ConfigValidationError } from './config-validation-error.js';
export {
  REDACTED,
  createConfigValidationError,
  formatConfigValidationError,
} from './config-validation-error.js';
export { ConfigKitArgumentError, InvalidSelectorError } from './argument-errors.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
