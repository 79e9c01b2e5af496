import { isDeepStrictEqual } from 'util';
import { defineConstraint } from './define';
import { assertLength } from './string';
import type { Constraint, ConstraintOptions } from './types';

export function validateArrayLength(
  items: readonly unknown[],
  limit: { readonly min?: number; readonly max?: number }
): boolean {
  if (limit.min !== undefined && items.length < limit.min) {
    return false;
  }
  return limit.max === undefined || items.length <= limit.max;
}

function sortedKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Index of the first element equal to an earlier one, or -1.
 *
 * Primitives are looked up in a set. Objects and arrays are bucketed by a
 * key-sorted serialization and compared deeply only within their bucket.
 */
export function findDuplicateIndex(items: readonly unknown[]): number {
  const primitives = new Set<unknown>();
  const composites = new Map<string, unknown[]>();
  for (let i = 0; i < items.length; i += 1) {
    const item = items[i];
    if (item === null || typeof item !== 'object') {
      if (primitives.has(item)) {
        return i;
      }
      primitives.add(item);
      continue;
    }
    const key = JSON.stringify(item, sortedKeys);
    const bucket = composites.get(key);
    if (bucket === undefined) {
      composites.set(key, [item]);
    } else if (bucket.some((seen) => isDeepStrictEqual(seen, item))) {
      return i;
    } else {
      bucket.push(item);
    }
  }
  return -1;
}

export function validateArrayUniqueness(items: readonly unknown[]): boolean {
  return findDuplicateIndex(items) === -1;
}

export function minItems(limit: number, options?: ConstraintOptions): Constraint<readonly unknown[]> {
  assertLength('minItems', limit);
  return defineConstraint<readonly unknown[]>(
    {
      kind: 'minItems',
      params: { minItems: limit },
      test: (items) => validateArrayLength(items, { min: limit }),
      describe: (items) => ({ length: items.length }),
    },
    options
  );
}

export function maxItems(limit: number, options?: ConstraintOptions): Constraint<readonly unknown[]> {
  assertLength('maxItems', limit);
  return defineConstraint<readonly unknown[]>(
    {
      kind: 'maxItems',
      params: { maxItems: limit },
      test: (items) => validateArrayLength(items, { max: limit }),
      describe: (items) => ({ length: items.length }),
    },
    options
  );
}

export function uniqueItems(options?: ConstraintOptions): Constraint<readonly unknown[]> {
  return defineConstraint<readonly unknown[]>(
    {
      kind: 'uniqueItems',
      params: { uniqueItems: true },
      test: validateArrayUniqueness,
      describe: (items) => ({ duplicateIndex: findDuplicateIndex(items) }),
    },
    options
  );
}
