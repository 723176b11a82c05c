export { isLikelySecret, isSecureReference } from './secret-detector.js';
export type { SecretFormat } from './secret-format.js';
export { SECRET_FORMATS, matchesSecretFormat, secretFormatLabel } from './secret-format.js';
export type { SecurityLevel } from './security-level.js';
export { securityLevelLabel } from './security-level.js';
