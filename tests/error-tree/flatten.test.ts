import { describe, expect, test } from '@jest/globals';
import { escapePointerSegment, flattenErrors, joinPointer } from '../../src/error-tree/flatten';
import type { ErrorTree } from '../../src/error-tree/tree';

describe('JSON pointer helpers', () => {
  test('escapes tilde before slash', () => {
    expect(escapePointerSegment('a/b')).toBe('a~1b');
    expect(escapePointerSegment('a~b')).toBe('a~0b');
    expect(escapePointerSegment('~/')).toBe('~0~1');
  });

  test('joins segments onto a base', () => {
    expect(joinPointer('', 'items')).toBe('/items');
    expect(joinPointer('/items', 3)).toBe('/items/3');
  });
});

describe('flattenErrors', () => {
  const tree: ErrorTree<string> = {
    kind: 'object',
    errors: ['root failure'],
    properties: new Map<string, ErrorTree<string>>([
      ['val', { kind: 'newtype', errors: ['first', 'second'] }],
      [
        'tags',
        {
          kind: 'array',
          errors: ['the items must be unique.'],
          items: new Map<number, ErrorTree<string>>([[1, { kind: 'newtype', errors: ['empty'] }]]),
        },
      ],
      ['a/b', { kind: 'newtype', errors: ['escaped'] }],
    ]),
  };

  test('walks parent before child in insertion order', () => {
    expect(flattenErrors(tree)).toEqual([
      { path: '', message: 'root failure' },
      { path: '/val', message: 'first' },
      { path: '/val', message: 'second' },
      { path: '/tags', message: 'the items must be unique.' },
      { path: '/tags/1', message: 'empty' },
      { path: '/a~1b', message: 'escaped' },
    ]);
  });

  test('prefixes a base path', () => {
    expect(flattenErrors({ kind: 'newtype', errors: ['x'] }, '/body')).toEqual([
      { path: '/body', message: 'x' },
    ]);
  });

  test('uses the message of constraint leaves', () => {
    expect(
      flattenErrors({
        kind: 'newtype',
        errors: [{ kind: 'minimum', message: 'the number must be >= 0.', messageId: 'minimum', params: {} }],
      })
    ).toEqual([{ path: '', message: 'the number must be >= 0.' }]);
  });
});
