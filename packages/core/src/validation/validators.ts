/**
 * Field-level validators, invoked after type coercion
 */

import { z } from 'zod';
import type { ConfigValue } from '../types/index.js';
import { isListValue } from '../types/index.js';
import { ConfigError, TypeCoercionError, ValidationError } from '../errors/index.js';

export interface Validator {
  /** Throws a ConfigError naming `name` when the value is rejected */
  ensureValid(name: string, value: ConfigValue): void;
  /** Human-readable constraint, rendered as "Valid Values" in docs */
  describe(): string;
}

function show(value: unknown): string {
  if (Array.isArray(value)) return value.join(',');
  return String(value);
}

/**
 * Numeric range, inclusive on both ends. Out-of-range values are reported as
 * coercion failures since the raw string cannot become a legal number.
 */
export class RangeValidator implements Validator {
  private readonly schema: z.ZodNumber;

  constructor(
    readonly min: number,
    readonly max?: number
  ) {
    const base = z.number().min(min);
    this.schema = max === undefined ? base : base.max(max);
  }

  ensureValid(name: string, value: ConfigValue): void {
    if (value === null) {
      throw new TypeCoercionError({
        message: `Invalid value null for configuration ${name}: Value must be non-null`,
        keys: [name],
      });
    }

    if (!this.schema.safeParse(value).success) {
      throw new TypeCoercionError({
        message: `Invalid value ${show(value)} for configuration ${name}: Value must be ${this.describeBound()}`,
        keys: [name],
        suggestion: `Use a number ${this.describe()}.`,
      });
    }
  }

  describe(): string {
    return this.max === undefined ? `[${this.min},...]` : `[${this.min},...,${this.max}]`;
  }

  private describeBound(): string {
    return this.max === undefined
      ? `at least ${this.min}`
      : `no less than ${this.min} and no more than ${this.max}`;
  }
}

/** Inclusive numeric range */
export function between(min: number, max: number): RangeValidator {
  return new RangeValidator(min, max);
}

/** Inclusive lower bound */
export function atLeast(min: number): RangeValidator {
  return new RangeValidator(min);
}

/**
 * Closed set of legal strings with a designated default.
 * Membership is an exact, case-sensitive match.
 */
export class ClosedSetValidator<T extends string> implements Validator {
  private readonly members: ReadonlySet<string>;

  constructor(
    private readonly legal: readonly [T, ...T[]],
    private readonly fallback: T
  ) {
    this.members = new Set<string>(legal);
    if (!this.is(fallback)) {
      throw new ConfigError({
        code: 'INVALID_DEFINITION',
        message: `Default "${fallback}" is not one of: ${legal.join(', ')}`,
      });
    }
  }

  values(): readonly T[] {
    return this.legal;
  }

  defaultValue(): T {
    return this.fallback;
  }

  is(value: unknown): value is T {
    return typeof value === 'string' && this.members.has(value);
  }

  /** Returns the value as a member of the set, or throws ValidationError */
  validate(raw: unknown, name?: string): T {
    if (this.is(raw)) {
      return raw;
    }

    const subject = name ? `configuration ${name}` : 'value';
    throw new ValidationError({
      message: `Invalid value ${show(raw)} for ${subject}: String must be one of: ${this.legal.join(', ')}`,
      keys: name ? [name] : [],
      suggestion: `Use one of ${this.legal.join(', ')} (case-sensitive), or omit the key to use "${this.fallback}".`,
    });
  }

  ensureValid(name: string, value: ConfigValue): void {
    this.validate(value, name);
  }

  describe(): string {
    return `[${this.legal.join(', ')}]`;
  }
}

export function closedSet<T extends string>(
  values: readonly [T, ...T[]],
  defaultValue: T
): ClosedSetValidator<T> {
  return new ClosedSetValidator(values, defaultValue);
}

/** Rejects null and empty lists */
export class NonEmptyListValidator implements Validator {
  ensureValid(name: string, value: ConfigValue): void {
    if (!isListValue(value) || value.length === 0) {
      throw new ValidationError({
        message: `Invalid value ${show(value)} for configuration ${name}: List must contain at least one entry`,
        keys: [name],
        suggestion: `Provide a comma-separated list for "${name}".`,
      });
    }
  }

  describe(): string {
    return 'non-empty list';
  }
}

export function nonEmptyList(): NonEmptyListValidator {
  return new NonEmptyListValidator();
}
