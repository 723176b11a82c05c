import { z } from 'zod';
import { InvalidSelectorError } from '../errors/argument-errors.js';

/**
 * Keys of `T` whose (required) value type is assignable to `V`.
 *
 * Selectors are property keys rather than functions: the compiler checks
 * the key exists and carries the right value type, and the key itself is
 * the stable, human-readable name used in error keys.
 */
export type KeysMatching<T, V> = {
  [K in keyof T]-?: T[K] extends V ? K : never;
}[keyof T] &
  keyof T &
  string;

/** Property keys whose value is a string (or absent). */
export type StringKey<T> = KeysMatching<T, string | null | undefined>;

/**
 * A single top-level member, nothing else: no dotted paths, indexers, or calls.
 */
const PropertyNameSchema = z
  .string({ invalid_type_error: 'selector must be a property name string' })
  .min(1, 'selector must not be empty')
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'selector must name a single top-level property');

export interface PropertyAccessor<T, K extends keyof T & string> {
  /** Property name, used verbatim in `{section}:{property}` error keys. */
  readonly name: K;
  get(options: T): T[K];
}

/**
 * Resolve a selector into a getter and its property name.
 *
 * @throws InvalidSelectorError when the key is not a plain identifier.
 */
export function createPropertyAccessor<T, K extends keyof T & string>(key: K): PropertyAccessor<T, K> {
  const parsed = PropertyNameSchema.safeParse(key);
  if (!parsed.success) {
    const reason = parsed.error.errors[0]?.message ?? 'invalid selector';
    throw new InvalidSelectorError(String(key), reason);
  }

  return {
    name: key,
    get: (options) => options[key],
  };
}

/**
 * Narrow an accessed value to text. Absent values stay `null`; anything that
 * is not a string (a binder that produced a number, say) is stringified.
 */
export function readText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : String(value);
}

/** Empty or whitespace only. */
export function isBlank(value: string): boolean {
  return value.trim().length === 0;
}
