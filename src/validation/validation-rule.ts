import type { ConfigValidationError } from '../errors/config-validation-error.js';

/**
 * What a rule hands back: `null` on pass. Pure rules answer synchronously;
 * rules that probe the filesystem or network answer with a promise.
 */
export type RuleOutcome = ConfigValidationError | null | Promise<ConfigValidationError | null>;

/**
 * A single check over a configuration object.
 *
 * Implementations capture everything they need at construction, never mutate
 * `options`, and never throw for a failing value: failures are returned.
 */
export interface ValidationRule<T> {
  validate(options: T, sectionName: string): RuleOutcome;
}

export type Predicate<T> = (options: T) => boolean;
