import { defineConstraint } from './define';
import { assertLength } from './string';
import type { Constraint, ConstraintOptions } from './types';

type PropertyBag = Readonly<Record<string, unknown>>;

export function validateObjectSize(
  record: PropertyBag,
  limit: { readonly min?: number; readonly max?: number }
): boolean {
  const size = Object.keys(record).length;
  if (limit.min !== undefined && size < limit.min) {
    return false;
  }
  return limit.max === undefined || size <= limit.max;
}

export function minProperties(limit: number, options?: ConstraintOptions): Constraint<PropertyBag> {
  assertLength('minProperties', limit);
  return defineConstraint<PropertyBag>(
    {
      kind: 'minProperties',
      params: { minProperties: limit },
      test: (record) => validateObjectSize(record, { min: limit }),
      describe: (record) => ({ size: Object.keys(record).length }),
    },
    options
  );
}

export function maxProperties(limit: number, options?: ConstraintOptions): Constraint<PropertyBag> {
  assertLength('maxProperties', limit);
  return defineConstraint<PropertyBag>(
    {
      kind: 'maxProperties',
      params: { maxProperties: limit },
      test: (record) => validateObjectSize(record, { max: limit }),
      describe: (record) => ({ size: Object.keys(record).length }),
    },
    options
  );
}
