import { describe, expect, test } from '@jest/globals';
import {
  compilePattern,
  maxLength,
  minLength,
  pattern,
  stringLength,
  validateStringLength,
  validateStringPattern,
} from '../../src/constraints/string';
import { ConfigError } from '../../src/errors/config-error';

describe('string constraints', () => {
  test('length counts grapheme clusters', () => {
    expect(stringLength('abc')).toBe(3);
    expect(stringLength('é')).toBe(1);
    expect(stringLength('\u{1F468}‍\u{1F469}‍\u{1F467}')).toBe(1);
    expect(stringLength('')).toBe(0);
  });

  test('validateStringLength applies both bounds', () => {
    expect(validateStringLength('ab', { min: 2, max: 2 })).toBe(true);
    expect(validateStringLength('a', { min: 2 })).toBe(false);
    expect(validateStringLength('abc', { max: 2 })).toBe(false);
  });

  test('minLength and maxLength report the measured length', () => {
    expect(minLength(3).check('ab', { field: 'name' })).toEqual({
      kind: 'minLength',
      message: 'the length of the value must be >= 3.',
      messageId: 'min-length',
      params: { minLength: 3, length: 2 },
      field: 'name',
    });
    expect(maxLength(1).check('é', {})).toBeUndefined();
    expect(maxLength(1).check('ab', {})?.message).toBe('the length of the value must be <= 1.');
  });

  test('length limits must be non-negative integers', () => {
    expect(() => minLength(-1)).toThrow(ConfigError);
    expect(() => maxLength(1.5)).toThrow('maxLength must be a non-negative integer');
  });

  test('pattern searches unless the expression anchors', () => {
    expect(validateStringPattern('abc', compilePattern('b'))).toBe(true);
    expect(validateStringPattern('ba', compilePattern('^a'))).toBe(false);
    expect(validateStringPattern('ab', compilePattern('^a'))).toBe(true);
  });

  test('pattern accepts a RegExp and reports its source', () => {
    const constraint = pattern(/^[a-z]+$/);
    expect(constraint.params).toEqual({ pattern: '^[a-z]+$' });
    expect(constraint.check('abc', {})).toBeUndefined();
    expect(constraint.check('ABC', {})?.message).toBe('the value must match the pattern of "^[a-z]+$".');
  });

  test('a RegExp keeps its flags', () => {
    const constraint = pattern(/^abc$/i);
    expect(constraint.check('ABC', {})).toBeUndefined();
    expect(constraint.check('abd', {})?.kind).toBe('pattern');
    expect(compilePattern(/a/imu).flags).toBe('imu');
    expect(compilePattern(/a/s).flags).toBe('su');
  });

  test('pattern gives the same answer on repeated checks', () => {
    const constraint = pattern('x');
    expect(constraint.check('x', {})).toBeUndefined();
    expect(constraint.check('x', {})).toBeUndefined();
    const global = pattern(/x/g);
    expect(global.check('x', {})).toBeUndefined();
    expect(global.check('x', {})).toBeUndefined();
    expect(compilePattern(/x/gy).flags).toBe('u');
  });

  test('invalid expressions fail at declaration time', () => {
    expect(() => pattern('[')).toThrow(ConfigError);
    expect(() => compilePattern('(')).toThrow('Invalid pattern: (');
  });
});
