import { assertNever } from '../runtime/assert-never.js';

/**
 * Advisory severity for default-value warnings. The validation core treats
 * every level as a plain failure; the label is there for callers to act on.
 */
export type SecurityLevel = 'critical' | 'warning' | 'info';

export function securityLevelLabel(level: SecurityLevel): string {
  switch (level) {
    case 'critical':
      return 'CRITICAL';
    case 'warning':
      return 'WARNING';
    case 'info':
      return 'INFO';
    default:
      return assertNever(level);
  }
}
