import { REDACTED, type ConfigValidationError } from '../../errors/config-validation-error.js';
import { securityLevelLabel, type SecurityLevel } from '../../security/security-level.js';
import { readText, type StringKey } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

/**
 * Flags a value equal (ignoring case) to a known-insecure default such as `admin`.
 */
export class DefaultValueWarningRule<T, K extends StringKey<T>> extends PropertyRule<T, K> {
  constructor(
    key: K,
    private readonly defaultValue: string,
    private readonly level: SecurityLevel = 'warning',
    customMessage?: string
  ) {
    super(key, customMessage);
  }

  validate(options: T, sectionName: string): ConfigValidationError | null {
    const value = readText(this.accessor.get(options));
    if (value === null || value.toLowerCase() !== this.defaultValue.toLowerCase()) return null;

    return this.fail(
      sectionName,
      `[${securityLevelLabel(this.level)}] ${this.propertyName} is using default/insecure value`,
      REDACTED,
      ['Change to a secure value', `Default value '${this.defaultValue}' should not be used in production`]
    );
  }
}
