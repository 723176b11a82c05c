/**
 * Render a configuration value for messages and suggestions.
 *
 * Dates render as ISO-8601 (an invalid Date renders as `Invalid Date`
 * instead of throwing from `toISOString`). Everything else goes through `String`.
 */
export function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  return String(value);
}
