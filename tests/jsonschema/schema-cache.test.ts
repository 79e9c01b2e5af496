import { describe, expect, jest, test } from '@jest/globals';
import { ErrorLogger } from '../../src/errors/logger';
import { SchemaCache, createAjv } from '../../src/jsonschema/schema-cache';
import { v } from '../../src/schema/builders';

const createSink = () => ({
  warn: jest.fn<(message: string) => void>(),
  error: jest.fn<(message: string) => void>(),
});

const Limit = v.object('Limit', { val: v.integer().minimum(0).maximum(1000) });

describe('SchemaCache', () => {
  test('compiles each declaration once', () => {
    const ajv = createAjv();
    const compile = jest.spyOn(ajv, 'compile');
    const cache = new SchemaCache({ ajv });

    const first = cache.compile(Limit);
    const second = cache.compile(Limit);

    expect(second).toBe(first);
    expect(compile).toHaveBeenCalledTimes(1);
    expect(cache.has(Limit)).toBe(true);
    expect(cache.size).toBe(1);
  });

  test('a recompile after clear behaves like the first', () => {
    const cache = new SchemaCache();
    const before = cache.check(Limit, { val: 'x' });

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.check(Limit, { val: 'x' })).toEqual(before);
  });

  test('check reports violations with pointers and messages', () => {
    const cache = new SchemaCache();

    expect(cache.check(Limit, { val: 500 })).toEqual({ valid: true });
    expect(cache.check(Limit, { val: 1.5 })).toEqual({
      valid: false,
      violations: [{ path: '/val', message: 'must be integer', keyword: 'type' }],
    });
    expect(cache.check(Limit, {})).toEqual({
      valid: false,
      violations: [{ path: '/val', message: "must have required property 'val'", keyword: 'required' }],
    });
  });

  test('constraint violations pass the structural check', () => {
    const cache = new SchemaCache();

    expect(cache.check(Limit, { val: 1234 })).toEqual({ valid: true });
    expect(cache.check(Limit, { val: -1 })).toEqual({ valid: true });
  });

  test('a schema that fails to compile falls back to a permissive one and is logged', () => {
    const ajv = createAjv();
    jest.spyOn(ajv, 'compile').mockImplementationOnce(() => {
      throw new Error('unsupported keyword');
    });
    const sink = createSink();
    const cache = new SchemaCache({ ajv, logger: new ErrorLogger(sink) });

    const compiled = cache.compile(Limit);

    expect(compiled.schema).toEqual({});
    expect(compiled.check({ val: 'anything' })).toEqual({ valid: true });
    expect(sink.error).toHaveBeenCalledTimes(1);
    const payload: unknown = JSON.parse(String(sink.error.mock.calls[0][0]));
    expect(payload).toMatchObject({
      level: 'error',
      message: 'Failed to compile JSON Schema; falling back to a permissive schema',
      code: 'CONFIG_INVALID',
      context: { module: 'jsonschema/schema-cache', data: { title: 'Limit' } },
    });
  });
});
