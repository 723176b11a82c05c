/**
 * One ordering contract for every threshold rule.
 *
 * A comparator returns a negative number, zero, or a positive number.
 * `NaN` means "not comparable"; threshold rules treat it as a failure.
 */
export type Comparator<V> = (left: V, right: V) => number;

/**
 * Domain types (durations, versions, money) implement this to take part in
 * threshold rules without a custom comparator.
 */
export interface Comparable<V> {
  compareTo(other: V): number;
}

/** Values the default comparator can order. */
export type Orderable = number | bigint | string | Date | Comparable<never>;

export function isComparable(value: unknown): value is Comparable<unknown> {
  return typeof value === 'object' && value !== null && 'compareTo' in value && typeof value.compareTo === 'function';
}

/**
 * Default comparator.
 *
 * Numbers, bigints, and Dates (by timestamp) compare numerically with each
 * other; strings compare by UTF-16 code units; `Comparable` objects decide
 * for themselves. Any other pairing is not comparable.
 */
export function compareOrdered(left: unknown, right: unknown): number {
  if (isComparable(left)) {
    return left.compareTo(right);
  }

  if (typeof left === 'string' || typeof right === 'string') {
    if (typeof left !== 'string' || typeof right !== 'string') return Number.NaN;
    return left < right ? -1 : left > right ? 1 : 0;
  }

  const a = toNumeric(left);
  const b = toNumeric(right);
  if (a === null || b === null) return Number.NaN;
  // Relational operators compare number and bigint exactly, mixed or not.
  if (a < b) return -1;
  if (a > b) return 1;
  return Number(a) === Number(b) ? 0 : Number.NaN;
}

function toNumeric(value: unknown): number | bigint | null {
  if (typeof value === 'number' || typeof value === 'bigint') return value;
  if (value instanceof Date) return value.getTime();
  return null;
}
