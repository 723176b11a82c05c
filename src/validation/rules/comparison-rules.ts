import type { ConfigValidationError } from '../../errors/config-validation-error.js';
import { ConfigKitArgumentError } from '../../errors/argument-errors.js';
import { formatValue } from '../../utils/format-value.js';
import { compareOrdered, type Comparator, type Orderable } from '../comparison.js';
import type { KeysMatching } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

/** Property keys whose value can be ordered by the default comparator. */
export type OrderedKey<T> = KeysMatching<T, Orderable | null | undefined>;

/** The non-absent value type behind an ordered key. */
export type OrderedValue<T, K extends keyof T> = NonNullable<T[K]>;

/**
 * Base for threshold rules. A missing value, or one the comparator cannot
 * order against the threshold (`NaN`), fails.
 */
abstract class ThresholdRule<T, K extends OrderedKey<T>> extends PropertyRule<T, K> {
  protected constructor(
    key: K,
    customMessage: string | undefined,
    protected readonly compare: Comparator<OrderedValue<T, K>>
  ) {
    super(key, customMessage);
  }

  validate(options: T, sectionName: string): ConfigValidationError | null {
    const value = this.accessor.get(options);
    if (value !== null && value !== undefined && this.accepts(value)) return null;

    const current = formatValue(value);
    return this.fail(sectionName, this.describe(current), value, [...this.hints(), `Current value: ${current}`]);
  }

  protected abstract accepts(value: OrderedValue<T, K>): boolean;
  protected abstract describe(current: string): string;
  protected abstract hints(): readonly string[];
}

/** Exclusive lower bound: fails when `value <= minimum`. */
export class GreaterThanRule<T, K extends OrderedKey<T>> extends ThresholdRule<T, K> {
  constructor(
    key: K,
    private readonly minimum: OrderedValue<T, K>,
    customMessage?: string,
    compare: Comparator<OrderedValue<T, K>> = compareOrdered
  ) {
    super(key, customMessage, compare);
  }

  protected accepts(value: OrderedValue<T, K>): boolean {
    return this.compare(value, this.minimum) > 0;
  }

  protected describe(current: string): string {
    return `${this.propertyName} must be > ${formatValue(this.minimum)} (current: ${current})`;
  }

  protected hints(): readonly string[] {
    return [`Must be greater than ${formatValue(this.minimum)}`];
  }
}

/** Exclusive upper bound: fails when `value >= maximum`. */
export class LessThanRule<T, K extends OrderedKey<T>> extends ThresholdRule<T, K> {
  constructor(
    key: K,
    private readonly maximum: OrderedValue<T, K>,
    customMessage?: string,
    compare: Comparator<OrderedValue<T, K>> = compareOrdered
  ) {
    super(key, customMessage, compare);
  }

  protected accepts(value: OrderedValue<T, K>): boolean {
    return this.compare(value, this.maximum) < 0;
  }

  protected describe(current: string): string {
    return `${this.propertyName} must be < ${formatValue(this.maximum)} (current: ${current})`;
  }

  protected hints(): readonly string[] {
    return [`Must be less than ${formatValue(this.maximum)}`];
  }
}

/** Inclusive lower bound: fails when `value < minimum`. */
export class MinimumRule<T, K extends OrderedKey<T>> extends ThresholdRule<T, K> {
  constructor(
    key: K,
    private readonly minimum: OrderedValue<T, K>,
    customMessage?: string,
    compare: Comparator<OrderedValue<T, K>> = compareOrdered
  ) {
    super(key, customMessage, compare);
  }

  protected accepts(value: OrderedValue<T, K>): boolean {
    return this.compare(value, this.minimum) >= 0;
  }

  protected describe(current: string): string {
    return `${this.propertyName} must be at least ${formatValue(this.minimum)} (current: ${current})`;
  }

  protected hints(): readonly string[] {
    return [`Must be at least ${formatValue(this.minimum)}`];
  }
}

/** Inclusive upper bound: fails when `value > maximum`. */
export class MaximumRule<T, K extends OrderedKey<T>> extends ThresholdRule<T, K> {
  constructor(
    key: K,
    private readonly maximum: OrderedValue<T, K>,
    customMessage?: string,
    compare: Comparator<OrderedValue<T, K>> = compareOrdered
  ) {
    super(key, customMessage, compare);
  }

  protected accepts(value: OrderedValue<T, K>): boolean {
    return this.compare(value, this.maximum) <= 0;
  }

  protected describe(current: string): string {
    return `${this.propertyName} must be at most ${formatValue(this.maximum)} (current: ${current})`;
  }

  protected hints(): readonly string[] {
    return [`Must be at most ${formatValue(this.maximum)}`];
  }
}

/** Both bounds inclusive. */
export class RangeRule<T, K extends OrderedKey<T>> extends ThresholdRule<T, K> {
  constructor(
    key: K,
    private readonly minimum: OrderedValue<T, K>,
    private readonly maximum: OrderedValue<T, K>,
    customMessage?: string,
    compare: Comparator<OrderedValue<T, K>> = compareOrdered
  ) {
    super(key, customMessage, compare);
    if (!(compare(minimum, maximum) <= 0)) {
      throw new ConfigKitArgumentError(
        'minimum',
        `range ${formatValue(minimum)}-${formatValue(maximum)} is empty (minimum must not exceed maximum)`
      );
    }
  }

  protected accepts(value: OrderedValue<T, K>): boolean {
    return this.compare(value, this.minimum) >= 0 && this.compare(value, this.maximum) <= 0;
  }

  protected describe(current: string): string {
    return `${this.propertyName} must be between ${formatValue(this.minimum)} and ${formatValue(this.maximum)} (current: ${current})`;
  }

  protected hints(): readonly string[] {
    return [`Valid range: ${formatValue(this.minimum)}-${formatValue(this.maximum)}`];
  }
}
