export { PropertyRule, missingValueSuggestions } from './property-rule.js';
export { NotEmptyRule } from './not-empty-rule.js';
export { NotNullRule } from './not-null-rule.js';
export type { OrderedKey, OrderedValue } from './comparison-rules.js';
export { GreaterThanRule, LessThanRule, MinimumRule, MaximumRule, RangeRule } from './comparison-rules.js';
export { RegexRule } from './regex-rule.js';
export { NoPlainTextSecretsRule } from './no-plain-text-secrets-rule.js';
export { SecretFormatRule } from './secret-format-rule.js';
export { DefaultValueWarningRule } from './default-value-warning-rule.js';
export { FileExistsRule, DirectoryExistsRule } from './file-system-rules.js';
export type { PortKey } from './port-available-rule.js';
export { PortAvailableRule } from './port-available-rule.js';
export { UrlReachableRule } from './url-reachable-rule.js';
export { ConditionalRule } from './conditional-rule.js';
