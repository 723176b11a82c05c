import { REDACTED, type ConfigValidationError } from '../../errors/config-validation-error.js';
import { isLikelySecret } from '../../security/secret-detector.js';
import { readText, type StringKey } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

export class NoPlainTextSecretsRule<T, K extends StringKey<T>> extends PropertyRule<T, K> {
  constructor(key: K, customMessage?: string) {
    super(key, customMessage);
  }

  validate(options: T, sectionName: string): ConfigValidationError | null {
    const value = readText(this.accessor.get(options));
    if (!isLikelySecret(value, this.propertyName)) return null;

    return this.fail(sectionName, `${this.propertyName} appears to contain a plain-text secret`, REDACTED, [
      'Use Azure Key Vault: @Microsoft.KeyVault(SecretUri=...)',
      'Use AWS Secrets Manager: arn:aws:secretsmanager:...',
      'Use environment variables for sensitive data: ${VARIABLE_NAME}',
    ]);
  }
}
