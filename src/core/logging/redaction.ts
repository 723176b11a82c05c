/**
 * Redaction configuration for pino.
 *
 * Validation errors carry the offending value in `currentValue`; it never
 * reaches a log line, at any nesting depth the logger sees it.
 */
export const REDACTION_CONFIG = {
  paths: [
    'currentValue',
    '*.currentValue',
    'errors[*].currentValue',
    'error.errors[*].currentValue',

    'password',
    'secret',
    'token',
    'apiKey',
    'connectionString',
    '*.password',
    '*.secret',
    '*.token',
    '*.apiKey',
    '*.connectionString',

    'headers.authorization',
    'headers.Authorization',
  ],
  censor: '[REDACTED]',
};
