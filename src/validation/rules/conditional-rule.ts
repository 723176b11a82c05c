import type { Predicate, RuleOutcome, ValidationRule } from '../validation-rule.js';

/**
 * Gates `inner` behind a predicate over the whole options object.
 * When the predicate is false the inner rule is not invoked at all.
 */
export class ConditionalRule<T> implements ValidationRule<T> {
  constructor(
    private readonly predicate: Predicate<T>,
    private readonly inner: ValidationRule<T>
  ) {}

  validate(options: T, sectionName: string): RuleOutcome {
    return this.predicate(options) ? this.inner.validate(options, sectionName) : null;
  }
}
