import { describe, expect, test } from '@jest/globals';
import { ValidtreeError } from '../../src/errors/validtree-error';

const baseOptions = {
  message: 'Something went wrong',
  code: 'INTERNAL_UNEXPECTED' as const,
  category: 'internal' as const,
};

describe('ValidtreeError', () => {
  test('defaults severity to error and retryable to false', () => {
    const error = new ValidtreeError(baseOptions);
    expect(error.severity).toBe('error');
    expect(error.retryable).toBe(false);
    expect(error.name).toBe('ValidtreeError');
  });

  test('serializes internal cause variants', () => {
    const json = new ValidtreeError({ ...baseOptions, cause: new Error('Root cause') }).toJSON();
    expect(json.cause).toBe('Error: Root cause');

    const nested = new ValidtreeError({ ...baseOptions, message: 'Nested' });
    const nestedJson = new ValidtreeError({ ...baseOptions, cause: nested }).toJSON();
    expect(nestedJson.cause).toMatchObject({ message: 'Nested', code: 'INTERNAL_UNEXPECTED' });

    const stringCause = new ValidtreeError({ ...baseOptions, cause: 'string-cause' }).toJSON();
    expect(stringCause.cause).toBe('string-cause');

    const objectCause = new ValidtreeError({ ...baseOptions, cause: { foo: 'bar' } }).toJSON();
    expect(objectCause.cause).toBe('{"foo":"bar"}');

    const circular: Record<string, unknown> = {};
    circular.self = circular;
    const circularCause = new ValidtreeError({ ...baseOptions, cause: circular }).toJSON();
    expect(String(circularCause.cause)).toMatch(/^Unserializable cause/);
  });

  test('toPublicObject hides stack and cause', () => {
    const cause = new ValidtreeError({ ...baseOptions, message: 'Nested cause' });
    const publicObj = new ValidtreeError({ ...baseOptions, cause }).toPublicObject();
    expect(publicObj.stack).toBeUndefined();
    expect(publicObj.cause).toBeUndefined();
    expect(publicObj.message).toBe('Something went wrong');
  });

  test('isValidtreeError type guard', () => {
    expect(ValidtreeError.isValidtreeError(new ValidtreeError(baseOptions))).toBe(true);
    expect(ValidtreeError.isValidtreeError(new Error('nope'))).toBe(false);
  });
});
