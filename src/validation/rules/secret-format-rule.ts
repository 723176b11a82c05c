import { REDACTED, type ConfigValidationError } from '../../errors/config-validation-error.js';
import {
  matchesSecretFormat,
  secretFormatLabel,
  secretFormatSuggestion,
  type SecretFormat,
} from '../../security/secret-format.js';
import { isBlank, readText, type StringKey } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

/**
 * Non-empty values must be in exactly the expected secret format.
 */
export class SecretFormatRule<T, K extends StringKey<T>> extends PropertyRule<T, K> {
  constructor(
    key: K,
    private readonly expectedFormat: SecretFormat,
    customMessage?: string
  ) {
    super(key, customMessage);
  }

  validate(options: T, sectionName: string): ConfigValidationError | null {
    const value = readText(this.accessor.get(options));
    if (value === null || isBlank(value)) return null;
    if (matchesSecretFormat(value, this.expectedFormat, this.propertyName)) return null;

    return this.fail(
      sectionName,
      `${this.propertyName} does not follow ${secretFormatLabel(this.expectedFormat)} format`,
      REDACTED,
      [secretFormatSuggestion(this.expectedFormat)]
    );
  }
}
