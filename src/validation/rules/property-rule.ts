import {
  createConfigValidationError,
  type ConfigValidationError,
} from '../../errors/config-validation-error.js';
import { createPropertyAccessor, type PropertyAccessor } from '../property-accessor.js';
import type { RuleOutcome, ValidationRule } from '../validation-rule.js';

/**
 * Shared plumbing for rules bound to one property: resolves the selector once,
 * at construction, and builds `{section}:{property}` keys.
 */
export abstract class PropertyRule<T, K extends keyof T & string> implements ValidationRule<T> {
  protected readonly accessor: PropertyAccessor<T, K>;

  protected constructor(
    key: K,
    protected readonly customMessage?: string
  ) {
    this.accessor = createPropertyAccessor<T, K>(key);
  }

  get propertyName(): K {
    return this.accessor.name;
  }

  abstract validate(options: T, sectionName: string): RuleOutcome;

  protected keyFor(sectionName: string): string {
    return `${sectionName}:${this.propertyName}`;
  }

  protected fail(
    sectionName: string,
    defaultMessage: string,
    currentValue: unknown,
    suggestions: readonly string[]
  ): ConfigValidationError {
    return this.failWithMessage(sectionName, this.customMessage ?? defaultMessage, currentValue, suggestions);
  }

  /** Like `fail`, but the message is fixed: a custom message does not replace it. */
  protected failWithMessage(
    sectionName: string,
    message: string,
    currentValue: unknown,
    suggestions: readonly string[]
  ): ConfigValidationError {
    return createConfigValidationError(this.keyFor(sectionName), message, currentValue, suggestions);
  }
}

/**
 * Remediation hints for a missing value: the environment variable that
 * conventionally binds `{section}:{property}` uses `__` as the separator.
 */
export function missingValueSuggestions(key: string): readonly string[] {
  const envVar = key.replace(/:/g, '__').toUpperCase();
  return [
    `Set environment variable: ${envVar}`,
    `Or add ${envVar}=<value> to your .env file`,
    'Or update the configuration file',
  ];
}
