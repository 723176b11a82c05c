import type { ConfigValidationError } from '../../errors/config-validation-error.js';
import { PropertyRule, missingValueSuggestions } from './property-rule.js';

/**
 * Fails when the property is `null` or `undefined`, whatever its type.
 */
export class NotNullRule<T, K extends keyof T & string> extends PropertyRule<T, K> {
  constructor(key: K, customMessage?: string) {
    super(key, customMessage);
  }

  validate(options: T, sectionName: string): ConfigValidationError | null {
    const value = this.accessor.get(options);
    if (value !== null && value !== undefined) return null;

    return this.fail(
      sectionName,
      `${this.propertyName} must not be null`,
      undefined,
      missingValueSuggestions(this.keyFor(sectionName))
    );
  }
}
