import type { ConfigValidationError } from '../../errors/config-validation-error.js';
import { isBlank, readText, type StringKey } from '../property-accessor.js';
import { PropertyRule, missingValueSuggestions } from './property-rule.js';

/**
 * Fails on `null`, `undefined`, `''` and whitespace-only strings.
 */
export class NotEmptyRule<T, K extends StringKey<T>> extends PropertyRule<T, K> {
  constructor(key: K, customMessage?: string) {
    super(key, customMessage);
  }

  validate(options: T, sectionName: string): ConfigValidationError | null {
    const value = readText(this.accessor.get(options));
    if (value !== null && !isBlank(value)) return null;

    return this.fail(
      sectionName,
      `${this.propertyName} must not be empty`,
      value,
      missingValueSuggestions(this.keyFor(sectionName))
    );
  }
}
