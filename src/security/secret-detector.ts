/**
 * Plain-text secret heuristic.
 *
 * A value is only inspected when its property name looks secret-bearing;
 * secure references (vault pointers, ARNs, `${...}` placeholders) are
 * never flagged.
 */

const SECRET_KEYWORDS: readonly string[] = [
  'password',
  'passwd',
  'pwd',
  'secret',
  'token',
  'apikey',
  'api_key',
  'private_key',
  'privatekey',
  'client_secret',
  'clientsecret',
];

/**
 * Ordered secret shapes. All are anchored except the AWS access key id,
 * which is searched for anywhere in the value: such ids are routinely
 * embedded in longer strings.
 */
const SECRET_PATTERNS: readonly RegExp[] = [
  /^sk-[a-zA-Z0-9]{20,}$/, // vendor-prefixed API key
  /^[a-zA-Z0-9]{32,}$/, // long opaque token
  /^Bearer\s+[a-zA-Z0-9\-._~+/]+=*$/i, // Authorization header value
  /^[a-f0-9]{64}$/, // 256-bit hex key material
  /^AIza[0-9A-Za-z\-_]{35}$/, // Google API key
  /AKIA[0-9A-Z]{16}/, // AWS access key id
];

export const AZURE_KEY_VAULT_PREFIX = '@Microsoft.KeyVault';
export const AWS_SECRETS_MANAGER_PREFIX = 'arn:aws:secretsmanager';
export const ENV_PLACEHOLDER_PREFIX = '${';

/**
 * Whether `value` looks like a plain-text secret for a property called `propertyName`.
 */
export function isLikelySecret(value: string | null | undefined, propertyName: string): boolean {
  if (value === null || value === undefined || value.trim().length === 0) {
    return false;
  }

  const lowerPropertyName = propertyName.toLowerCase();
  if (!SECRET_KEYWORDS.some((keyword) => lowerPropertyName.includes(keyword))) {
    return false;
  }

  if (isSecureReference(value)) {
    return false;
  }

  return SECRET_PATTERNS.some((pattern) => pattern.test(value));
}

/**
 * Whether `value` points at externally stored secret material.
 *
 * The `${` check is a prefix test only; a closing brace is not required here.
 */
export function isSecureReference(value: string): boolean {
  return (
    startsWithIgnoreCase(value, AZURE_KEY_VAULT_PREFIX) ||
    startsWithIgnoreCase(value, AWS_SECRETS_MANAGER_PREFIX) ||
    value.startsWith(ENV_PLACEHOLDER_PREFIX)
  );
}

export function startsWithIgnoreCase(value: string, prefix: string): boolean {
  return value.slice(0, prefix.length).toLowerCase() === prefix.toLowerCase();
}
