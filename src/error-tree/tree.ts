import type { ConstraintError } from '../constraints/types';

/**
 * Failures on a composite value: its own failures plus one subtree per
 * failing property.
 */
export interface ObjectErrors<L> {
  readonly kind: 'object';
  readonly errors: readonly L[];
  readonly properties: ReadonlyMap<string, ErrorTree<L>>;
}

/**
 * Failures on a collection: its own failures (length, uniqueness) plus one
 * subtree per failing element, keyed by zero-based position.
 */
export interface ArrayErrors<L> {
  readonly kind: 'array';
  readonly errors: readonly L[];
  readonly items: ReadonlyMap<number, ErrorTree<L>>;
}

/**
 * Failures on a single value with no further structure.
 */
export interface NewTypeErrors<L> {
  readonly kind: 'newtype';
  readonly errors: readonly L[];
}

/**
 * Error tree mirroring the shape of the validated data. An empty node is never
 * built: success is the absence of a tree.
 */
export type ErrorTree<L> = ObjectErrors<L> | ArrayErrors<L> | NewTypeErrors<L>;

export type ValidationErrors = ErrorTree<ConstraintError>;

export type LocalizedErrors = ErrorTree<string>;

export function objectErrors<L>(
  errors: readonly L[],
  properties: ReadonlyMap<string, ErrorTree<L>>
): ObjectErrors<L> | undefined {
  if (errors.length === 0 && properties.size === 0) {
    return undefined;
  }
  return { kind: 'object', errors, properties };
}

export function arrayErrors<L>(
  errors: readonly L[],
  items: ReadonlyMap<number, ErrorTree<L>>
): ArrayErrors<L> | undefined {
  if (errors.length === 0 && items.size === 0) {
    return undefined;
  }
  return { kind: 'array', errors, items };
}

export function newTypeErrors<L>(errors: readonly L[]): NewTypeErrors<L> | undefined {
  if (errors.length === 0) {
    return undefined;
  }
  return { kind: 'newtype', errors };
}

/**
 * Structure-preserving leaf transform. Keys and their order are kept.
 */
export function mapErrorTree<L, M>(tree: ErrorTree<L>, transform: (leaf: L) => M): ErrorTree<M> {
  const errors = tree.errors.map(transform);
  switch (tree.kind) {
    case 'object': {
      const properties = new Map<string, ErrorTree<M>>();
      for (const [key, child] of tree.properties) {
        properties.set(key, mapErrorTree(child, transform));
      }
      return { kind: 'object', errors, properties };
    }
    case 'array': {
      const items = new Map<number, ErrorTree<M>>();
      for (const [index, child] of tree.items) {
        items.set(index, mapErrorTree(child, transform));
      }
      return { kind: 'array', errors, items };
    }
    case 'newtype':
      return { kind: 'newtype', errors };
  }
}

export function countErrors<L>(tree: ErrorTree<L>): number {
  let count = tree.errors.length;
  if (tree.kind === 'object') {
    for (const child of tree.properties.values()) {
      count += countErrors(child);
    }
  } else if (tree.kind === 'array') {
    for (const child of tree.items.values()) {
      count += countErrors(child);
    }
  }
  return count;
}
