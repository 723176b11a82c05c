import { assertNever } from '../runtime/assert-never.js';
import {
  AWS_SECRETS_MANAGER_PREFIX,
  AZURE_KEY_VAULT_PREFIX,
  ENV_PLACEHOLDER_PREFIX,
  isLikelySecret,
  startsWithIgnoreCase,
} from './secret-detector.js';

/**
 * Where a secret is expected to live.
 *
 * `externalized` is the catch-all: any value the heuristic does not
 * consider a plain-text secret.
 */
export type SecretFormat = 'azure-key-vault' | 'aws-secrets-manager' | 'environment-variable' | 'externalized';

export const SECRET_FORMATS: readonly SecretFormat[] = [
  'azure-key-vault',
  'aws-secrets-manager',
  'environment-variable',
  'externalized',
];

export function secretFormatLabel(format: SecretFormat): string {
  switch (format) {
    case 'azure-key-vault':
      return 'AzureKeyVault';
    case 'aws-secrets-manager':
      return 'AwsSecretsManager';
    case 'environment-variable':
      return 'EnvironmentVariable';
    case 'externalized':
      return 'Externalized';
    default:
      return assertNever(format);
  }
}

/**
 * Exclusive check: a value in a different secure format does not match.
 * Unlike `isSecureReference`, the environment-variable form requires the closing `}`.
 */
export function matchesSecretFormat(value: string, format: SecretFormat, propertyName: string): boolean {
  switch (format) {
    case 'azure-key-vault':
      return startsWithIgnoreCase(value, AZURE_KEY_VAULT_PREFIX);
    case 'aws-secrets-manager':
      return startsWithIgnoreCase(value, AWS_SECRETS_MANAGER_PREFIX);
    case 'environment-variable':
      return value.startsWith(ENV_PLACEHOLDER_PREFIX) && value.endsWith('}');
    case 'externalized':
      return !isLikelySecret(value, propertyName);
    default:
      return assertNever(format);
  }
}

export function secretFormatSuggestion(format: SecretFormat): string {
  switch (format) {
    case 'azure-key-vault':
      return 'Use format: @Microsoft.KeyVault(SecretUri=https://...)';
    case 'aws-secrets-manager':
      return 'Use format: arn:aws:secretsmanager:region:account:secret:name';
    case 'environment-variable':
      return 'Use format: ${VARIABLE_NAME}';
    case 'externalized':
      return 'Move the value to an environment variable or a secret store';
    default:
      return assertNever(format);
  }
}
