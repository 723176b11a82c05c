import type { ConfigValidationError } from '../../errors/config-validation-error.js';
import { readText, type StringKey } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

/**
 * Absent values pass (absence is not a pattern violation); present values must match.
 */
export class RegexRule<T, K extends StringKey<T>> extends PropertyRule<T, K> {
  private readonly regex: RegExp;
  private readonly pattern: string;

  constructor(key: K, pattern: string | RegExp, customMessage?: string) {
    super(key, customMessage);
    this.pattern = typeof pattern === 'string' ? pattern : pattern.source;
    // g/y flags make `test` stateful through lastIndex; repeated validations must agree.
    this.regex =
      typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }

  validate(options: T, sectionName: string): ConfigValidationError | null {
    const value = readText(this.accessor.get(options));
    if (value === null || this.regex.test(value)) return null;

    return this.fail(sectionName, `${this.propertyName} does not match required pattern`, value, [
      `Required pattern: ${this.pattern}`,
      `Current value: ${value}`,
    ]);
  }
}
