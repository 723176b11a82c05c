import { formatValue } from '../utils/format-value.js';

/**
 * A single rule failure.
 *
 * `key` is always `{section}:{property}`. `currentValue` may be the literal
 * `[REDACTED]` for rules that inspect secrets.
 */
export type ConfigValidationError = Readonly<{
  readonly key: string;
  readonly message: string;
  readonly currentValue?: unknown;
  readonly suggestions: readonly string[];
}>;

/** Placeholder reported instead of secret material. */
export const REDACTED = '[REDACTED]';

export function createConfigValidationError(
  key: string,
  message: string,
  currentValue?: unknown,
  suggestions: Iterable<string> = []
): ConfigValidationError {
  return Object.freeze({
    key,
    message,
    currentValue,
    suggestions: Object.freeze([...suggestions]),
  });
}

/**
 * Multi-line console rendering:
 *
 * ```
 *   ✗ Database:Port: Port 5432 is already in use
 *     Current value: 5432
 *     → Choose a different port or stop the service using this port
 * ```
 */
export function formatConfigValidationError(error: ConfigValidationError): string {
  const lines = [`  ✗ ${error.key}: ${error.message}`];

  if (error.currentValue !== null && error.currentValue !== undefined) {
    lines.push(`    Current value: ${formatValue(error.currentValue)}`);
  }

  for (const suggestion of error.suggestions) {
    lines.push(`    → ${suggestion}`);
  }

  return lines.map((line) => `${line}\n`).join('');
}
