import { describe, expect, test } from '@jest/globals';
import type { ErrorObject } from 'ajv';
import { toSchemaViolation, toSchemaViolations } from '../../src/jsonschema/violations';

function ajvError(overrides: Partial<ErrorObject>): ErrorObject {
  return {
    keyword: 'type',
    instancePath: '',
    schemaPath: '#/type',
    params: {},
    ...overrides,
  };
}

describe('schema violations', () => {
  test('keeps the instance path for value keywords', () => {
    expect(
      toSchemaViolation(ajvError({ keyword: 'type', instancePath: '/val', message: 'must be integer' }))
    ).toEqual({ path: '/val', message: 'must be integer', keyword: 'type' });
  });

  test('moves required and additionalProperties onto the named property', () => {
    expect(
      toSchemaViolation(
        ajvError({
          keyword: 'required',
          instancePath: '/inner',
          params: { missingProperty: 'n' },
          message: "must have required property 'n'",
        })
      ).path
    ).toBe('/inner/n');
    expect(
      toSchemaViolation(
        ajvError({
          keyword: 'additionalProperties',
          params: { additionalProperty: 'a/b' },
          message: 'must NOT have additional properties',
        })
      ).path
    ).toBe('/a~1b');
  });

  test('supplies a message when ajv gives none', () => {
    expect(toSchemaViolation(ajvError({ keyword: 'enum' })).message).toBe(
      'must pass "enum" keyword validation'
    );
  });

  test('no errors means no violations', () => {
    expect(toSchemaViolations(null)).toEqual([]);
    expect(toSchemaViolations(undefined)).toEqual([]);
  });
});
