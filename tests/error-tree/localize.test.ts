import { describe, expect, jest, test } from '@jest/globals';
import type { ConstraintError, ConstraintParams } from '../../src/constraints/types';
import { localizeError, localizeErrors } from '../../src/error-tree/localize';
import type { Translator } from '../../src/error-tree/localize';
import type { ErrorTree } from '../../src/error-tree/tree';

const failure: ConstraintError = {
  kind: 'maximum',
  message: 'the number must be <= 1000.',
  messageId: 'maximum',
  params: { maximum: 1000, value: 1234 },
};

function translator(table: Record<string, string>): Translator {
  return {
    translate: (messageId: string, args: ConstraintParams) => {
      const template = table[messageId];
      return template === undefined ? undefined : template.replace('{maximum}', String(args.maximum));
    },
  };
}

describe('localizeError', () => {
  test('translates by message id with the failure params', () => {
    expect(localizeError(failure, translator({ maximum: 'höchstens {maximum}' }))).toBe('höchstens 1000');
  });

  test('falls back to the message id', () => {
    expect(localizeError(failure, translator({}))).toBe('maximum');
  });

  test('string leaves pass through', () => {
    const translate = jest.fn<Translator['translate']>();
    expect(localizeError('already done', { translate })).toBe('already done');
    expect(translate).not.toHaveBeenCalled();
  });
});

describe('localizeErrors', () => {
  const tree: ErrorTree<ConstraintError> = {
    kind: 'object',
    errors: [],
    properties: new Map<string, ErrorTree<ConstraintError>>([['val', { kind: 'newtype', errors: [failure] }]]),
  };

  test('keeps the shape of the tree', () => {
    expect(localizeErrors(tree, translator({ maximum: 'max {maximum}' }))).toEqual({
      kind: 'object',
      errors: [],
      properties: new Map([['val', { kind: 'newtype', errors: ['max 1000'] }]]),
    });
  });

  test('localizing twice changes nothing', () => {
    const t = translator({ maximum: 'max {maximum}' });
    const once = localizeErrors(tree, t);

    expect(localizeErrors(once, t)).toEqual(once);
  });
});
