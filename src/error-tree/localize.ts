import type { ConstraintError, ConstraintParams } from '../constraints/types';
import { mapErrorTree } from './tree';
import type { ErrorTree, LocalizedErrors } from './tree';

export interface Translator {
  /**
   * Resolve a message. `undefined` signals a missing entry or a template that
   * could not be formatted with `args`.
   */
  translate(messageId: string, args: ConstraintParams): string | undefined;
}

export function localizeError(error: ConstraintError | string, translator: Translator): string {
  if (typeof error === 'string') {
    return error;
  }
  return translator.translate(error.messageId, error.params) ?? error.messageId;
}

/**
 * String leaves are already resolved and pass through untouched, so
 * localizing a localized tree changes nothing.
 */
export function localizeErrors(
  tree: ErrorTree<ConstraintError | string>,
  translator: Translator
): LocalizedErrors {
  return mapErrorTree(tree, (leaf) => localizeError(leaf, translator));
}
