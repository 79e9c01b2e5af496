import {
  ArraySchema,
  BooleanSchema,
  NumberSchema,
  ObjectSchema,
  OptionalSchema,
  RecordSchema,
  StringSchema,
  objectConfig,
} from './declarations';
import type { ObjectOptions, ObjectShape, Schema } from './declarations';

/**
 * Entry points of the declaration DSL.
 *
 * @example
 * const Limit = v.object('Limit', {
 *   val: v.integer().minimum(0).maximum(1000),
 *   tags: v.string().minLength(1).array().uniqueItems(),
 * });
 */
export const v = {
  integer: (): NumberSchema => new NumberSchema('integer', []),
  number: (): NumberSchema => new NumberSchema('number', []),
  string: (): StringSchema => new StringSchema([]),
  boolean: (): BooleanSchema => new BooleanSchema([]),
  array: <E extends Schema<unknown>>(element: E): ArraySchema<E> => new ArraySchema(element, []),
  optional: <I extends Schema<unknown>>(inner: I): OptionalSchema<I> => new OptionalSchema(inner),
  record: <V extends Schema<unknown>>(values: V): RecordSchema<V> => new RecordSchema(values, []),
  object: <S extends ObjectShape>(
    name: string,
    fields: S,
    options: ObjectOptions<S> = {}
  ): ObjectSchema<S> => new ObjectSchema(name, fields, objectConfig(options), []),
};
