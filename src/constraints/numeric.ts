import { ConfigError } from '../errors/config-error';
import { defineConstraint } from './define';
import type { Constraint, ConstraintOptions } from './types';

export type RangeKind = 'minimum' | 'maximum' | 'exclusiveMinimum' | 'exclusiveMaximum';

/**
 * Quotient tolerance for non-integer `multipleOf` checks.
 */
export const MULTIPLE_OF_PRECISION = 1e-9;

export function validateNumericRange(value: number, limit: number, kind: RangeKind): boolean {
  switch (kind) {
    case 'minimum':
      return value >= limit;
    case 'maximum':
      return value <= limit;
    case 'exclusiveMinimum':
      return value > limit;
    case 'exclusiveMaximum':
      return value < limit;
  }
}

/**
 * Integers are compared exactly. Anything else passes when `value / divisor`
 * lies within {@link MULTIPLE_OF_PRECISION} of an integer.
 */
export function validateNumericMultipleOf(value: number, divisor: number): boolean {
  if (Number.isInteger(value) && Number.isInteger(divisor)) {
    return value % divisor === 0;
  }
  const quotient = value / divisor;
  return Math.abs(Math.round(quotient) - quotient) <= MULTIPLE_OF_PRECISION;
}

function assertFinite(kind: string, limit: number): void {
  if (!Number.isFinite(limit)) {
    throw new ConfigError(`${kind} must be a finite number`, {
      context: { data: { kind, limit: String(limit) } },
    });
  }
}

function range(kind: RangeKind, limit: number, options?: ConstraintOptions): Constraint<number> {
  assertFinite(kind, limit);
  return defineConstraint<number>(
    {
      kind,
      params: { [kind]: limit },
      test: (value) => validateNumericRange(value, limit, kind),
      describe: (value) => ({ value }),
    },
    options
  );
}

export function minimum(limit: number, options?: ConstraintOptions): Constraint<number> {
  return range('minimum', limit, options);
}

export function maximum(limit: number, options?: ConstraintOptions): Constraint<number> {
  return range('maximum', limit, options);
}

export function exclusiveMinimum(limit: number, options?: ConstraintOptions): Constraint<number> {
  return range('exclusiveMinimum', limit, options);
}

export function exclusiveMaximum(limit: number, options?: ConstraintOptions): Constraint<number> {
  return range('exclusiveMaximum', limit, options);
}

export function multipleOf(divisor: number, options?: ConstraintOptions): Constraint<number> {
  assertFinite('multipleOf', divisor);
  if (divisor <= 0) {
    throw new ConfigError('multipleOf must be greater than zero', {
      context: { data: { multipleOf: divisor } },
    });
  }
  return defineConstraint<number>(
    {
      kind: 'multipleOf',
      params: { multipleOf: divisor },
      test: (value) => validateNumericMultipleOf(value, divisor),
      describe: (value) => ({ value }),
    },
    options
  );
}
