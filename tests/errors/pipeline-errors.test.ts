import { describe, expect, test } from '@jest/globals';
import type { ConstraintError } from '../../src/constraints/types';
import { newTypeErrors, objectErrors } from '../../src/error-tree/tree';
import type { ValidationErrors } from '../../src/error-tree/tree';
import { DecodeError } from '../../src/errors/decode-error';
import { InternalMismatchError } from '../../src/errors/internal-mismatch-error';
import { isPipelineError } from '../../src/errors/pipeline-error';
import { SchemaError } from '../../src/errors/schema-error';
import { ValidationError } from '../../src/errors/validation-error';
import { ValidtreeError } from '../../src/errors/validtree-error';

const tooLarge: ConstraintError = {
  kind: 'maximum',
  message: 'the number must be <= 1000.',
  messageId: 'maximum',
  params: { maximum: 1000, value: 1234 },
  field: 'val',
};

function valTree(): ValidationErrors {
  const leaf = newTypeErrors([tooLarge]);
  if (!leaf) {
    throw new Error('expected a leaf');
  }
  const tree = objectErrors<ConstraintError>([], new Map([['val', leaf]]));
  if (!tree) {
    throw new Error('expected a tree');
  }
  return tree;
}

describe('DecodeError', () => {
  test('defaults to a malformed input at the decoding stage', () => {
    const error = new DecodeError('Failed to parse JSON content');

    expect(error.kind).toBe('decode');
    expect(error.code).toBe('DECODE_MALFORMED_INPUT');
    expect(error.stage).toBe('decoding');
    expect(error.category).toBe('decode');
    expect(error.severity).toBe('warning');
    expect(error.retryable).toBe(false);
  });

  test('accepts a binding stage and a type mismatch code', () => {
    const error = new DecodeError('Value does not match the target type', {
      code: 'DECODE_TYPE_MISMATCH',
      stage: 'deserializing',
    });

    expect(error.code).toBe('DECODE_TYPE_MISMATCH');
    expect(error.stage).toBe('deserializing');
  });
});

describe('SchemaError', () => {
  test('summarizes every violation in the message', () => {
    const error = new SchemaError([
      { path: '/val', message: 'must be <= 1000', keyword: 'maximum' },
      { path: '', message: "must have required property 'id'", keyword: 'required' },
    ]);

    expect(error.message).toBe(
      "Schema validation failed: /val must be <= 1000; / must have required property 'id'"
    );
    expect(error.kind).toBe('schema');
    expect(error.stage).toBe('schemaChecking');
    expect(error.code).toBe('VALIDATION_SCHEMA_MISMATCH');
    expect(error.violations).toHaveLength(2);
  });
});

describe('ValidationError', () => {
  test('message is the serialized tree', () => {
    const error = new ValidationError(valTree());

    expect(error.message).toBe('{"errors":[],"properties":{"val":["the number must be <= 1000."]}}');
    expect(error.kind).toBe('validation');
    expect(error.stage).toBe('validating');
    expect(error.code).toBe('VALIDATION_CONSTRAINT_FAILED');
  });

  test('flatten yields pointer and message pairs', () => {
    expect(new ValidationError(valTree()).flatten()).toEqual([
      { path: '/val', message: 'the number must be <= 1000.' },
    ]);
  });
});

describe('InternalMismatchError', () => {
  test('is fatal and internal', () => {
    const error = new InternalMismatchError('Bound value does not conform');

    expect(error.kind).toBe('internalMismatch');
    expect(error.severity).toBe('fatal');
    expect(error.category).toBe('internal');
    expect(error.code).toBe('INTERNAL_SCHEMA_MISMATCH');
    expect(error.stage).toBe('deserializing');
    expect(new InternalMismatchError('x', { stage: 'validating' }).stage).toBe('validating');
  });
});

describe('isPipelineError', () => {
  test('recognizes the four pipeline kinds only', () => {
    expect(isPipelineError(new DecodeError('x'))).toBe(true);
    expect(isPipelineError(new SchemaError([]))).toBe(true);
    expect(isPipelineError(new ValidationError(valTree()))).toBe(true);
    expect(isPipelineError(new InternalMismatchError('x'))).toBe(true);
    expect(
      isPipelineError(new ValidtreeError({ message: 'x', code: 'UNKNOWN', category: 'unknown' }))
    ).toBe(false);
    expect(isPipelineError(new Error('x'))).toBe(false);
  });

  test('pipeline errors are ValidtreeErrors', () => {
    expect(new DecodeError('x')).toBeInstanceOf(ValidtreeError);
    expect(new DecodeError('x').name).toBe('DecodeError');
  });
});
