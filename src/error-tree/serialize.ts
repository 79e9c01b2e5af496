import type { ConstraintError } from '../constraints/types';
import type { ErrorTree } from './tree';

export type SerializedErrorTree =
  | string[]
  | { errors: string[]; properties: { [key: string]: SerializedErrorTree } }
  | { errors: string[]; items: { [index: string]: SerializedErrorTree } };

function message(leaf: ConstraintError | string): string {
  return typeof leaf === 'string' ? leaf : leaf.message;
}

/**
 * JSON body form of a tree. Several failures on one value stay in one list.
 */
export function serializeErrors(tree: ErrorTree<ConstraintError | string>): SerializedErrorTree {
  const errors = tree.errors.map(message);
  switch (tree.kind) {
    case 'newtype':
      return errors;
    case 'object': {
      const properties: { [key: string]: SerializedErrorTree } = {};
      for (const [key, child] of tree.properties) {
        properties[key] = serializeErrors(child);
      }
      return { errors, properties };
    }
    case 'array': {
      const items: { [index: string]: SerializedErrorTree } = {};
      for (const [index, child] of tree.items) {
        items[String(index)] = serializeErrors(child);
      }
      return { errors, items };
    }
  }
}
