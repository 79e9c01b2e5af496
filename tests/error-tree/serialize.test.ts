import { describe, expect, test } from '@jest/globals';
import { serializeErrors } from '../../src/error-tree/serialize';
import type { ErrorTree } from '../../src/error-tree/tree';

describe('serializeErrors', () => {
  test('a newtype node is a plain list of messages', () => {
    expect(serializeErrors({ kind: 'newtype', errors: ['a', 'b'] })).toEqual(['a', 'b']);
  });

  test('object and array nodes nest their children', () => {
    const tree: ErrorTree<string> = {
      kind: 'object',
      errors: [],
      properties: new Map<string, ErrorTree<string>>([
        [
          'list',
          {
            kind: 'array',
            errors: ['too short'],
            items: new Map<number, ErrorTree<string>>([[0, { kind: 'newtype', errors: ['bad'] }]]),
          },
        ],
      ]),
    };

    expect(JSON.stringify(serializeErrors(tree))).toBe(
      '{"errors":[],"properties":{"list":{"errors":["too short"],"items":{"0":["bad"]}}}}'
    );
  });
});
