import type { ConstraintError } from '../constraints/types';
import type { ErrorTree } from './tree';

export interface FlatError {
  /** JSON pointer to the failing value, `""` for the root. */
  readonly path: string;
  readonly message: string;
}

export function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function joinPointer(base: string, segment: string | number): string {
  return `${base}/${escapePointerSegment(String(segment))}`;
}

function leafMessage(leaf: ConstraintError | string): string {
  return typeof leaf === 'string' ? leaf : leaf.message;
}

function collect(tree: ErrorTree<ConstraintError | string>, path: string, out: FlatError[]): void {
  for (const leaf of tree.errors) {
    out.push({ path, message: leafMessage(leaf) });
  }
  if (tree.kind === 'object') {
    for (const [key, child] of tree.properties) {
      collect(child, joinPointer(path, key), out);
    }
  } else if (tree.kind === 'array') {
    for (const [index, child] of tree.items) {
      collect(child, joinPointer(path, index), out);
    }
  }
}

/**
 * Depth-first, parent before child, each node's leaves in insertion order.
 */
export function flattenErrors(
  tree: ErrorTree<ConstraintError | string>,
  basePath = ''
): FlatError[] {
  const out: FlatError[] = [];
  collect(tree, basePath, out);
  return out;
}
