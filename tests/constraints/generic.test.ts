import { describe, expect, jest, test } from '@jest/globals';
import { custom, enumerate, validateEnumeratedValues } from '../../src/constraints/generic';
import type { CustomOutcome } from '../../src/constraints/generic';

describe('enumerate', () => {
  test('membership uses structural equality', () => {
    expect(validateEnumeratedValues({ a: [1] }, [{ a: [1] }])).toBe(true);
    expect(validateEnumeratedValues(1, ['1'])).toBe(false);
  });

  test('failure lists the allowed members', () => {
    expect(enumerate<string>(['a', 'b']).check('c', { field: 'mode' })).toEqual({
      kind: 'enumerate',
      message: 'the value must be in [a, b].',
      messageId: 'enumerate',
      params: { enumerate: ['a', 'b'], value: 'c' },
      field: 'mode',
    });
    expect(enumerate<number>([1, 2]).check(3, {})?.message).toBe('the value must be in [1, 2].');
    expect(enumerate([true]).check(true, {})).toBeUndefined();
  });
});

describe('custom', () => {
  test('passes declared arguments after the value', () => {
    const check = jest.fn((value: number, low: number, high: number): CustomOutcome =>
      value >= low && value <= high ? undefined : 'out of range'
    );
    const constraint = custom<number, [number, number]>(check, [1, 5]);

    expect(constraint.check(3, {})).toBeUndefined();
    expect(check).toHaveBeenCalledWith(3, 1, 5);
  });

  test('a string outcome becomes a custom failure tagged with the field', () => {
    const constraint = custom((value: string): CustomOutcome => (value === 'x' ? 'x is reserved' : undefined), []);

    expect(constraint.check('x', { field: 'code' })).toEqual({
      kind: 'custom',
      message: 'x is reserved',
      messageId: 'custom',
      params: {},
      field: 'code',
    });
  });

  test('an issue outcome supplies message id and params', () => {
    const constraint = custom(
      (value: number): CustomOutcome => ({
        message: 'must be even',
        messageId: 'even',
        params: { value },
      }),
      []
    );

    expect(constraint.check(3, {})).toEqual({
      kind: 'custom',
      message: 'must be even',
      messageId: 'even',
      params: { value: 3 },
    });
  });

  test('declaration options take precedence over the outcome', () => {
    const constraint = custom((): CustomOutcome => 'nope', [], { message: 'overridden', messageId: 'fixed' });
    const failure = constraint.check(0, {});

    expect(failure?.message).toBe('overridden');
    expect(failure?.messageId).toBe('fixed');
  });

  test('exceptions thrown by the check propagate', () => {
    const constraint = custom((): CustomOutcome => {
      throw new Error('check failed');
    }, []);

    expect(() => constraint.check(1, {})).toThrow('check failed');
  });
});
