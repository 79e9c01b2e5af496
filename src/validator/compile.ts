import type { ObjectSchema, ObjectShape, Schema, SchemaVisitor } from '../schema/declarations';
import { isFiniteNumber, isInteger } from '../utils/guards';
import { FieldValidator } from './field-validator';
import { TypeValidator } from './type-validator';
import {
  ArrayValidator,
  OptionalValidator,
  RecordValidator,
  ScalarValidator,
} from './units';
import type { ValueValidator } from './units';

const typeCache = new WeakMap<object, TypeValidator>();

const compiler: SchemaVisitor<ValueValidator> = {
  number: (schema) =>
    schema.kind === 'integer'
      ? new ScalarValidator('integer', isInteger, schema.constraints)
      : new ScalarValidator('number', isFiniteNumber, schema.constraints),
  string: (schema) =>
    new ScalarValidator(
      'string',
      (value): value is string => typeof value === 'string',
      schema.constraints
    ),
  boolean: (schema) =>
    new ScalarValidator(
      'boolean',
      (value): value is boolean => typeof value === 'boolean',
      schema.constraints
    ),
  array: (schema) => new ArrayValidator(schema.constraints, compileValue(schema.element)),
  optional: (schema) => new OptionalValidator(compileValue(schema.inner)),
  record: (schema) => new RecordValidator(schema.constraints, compileValue(schema.values)),
  object: (schema) => compileType(schema),
};

export function compileValue(schema: Schema<unknown>): ValueValidator {
  return schema.accept(compiler);
}

/**
 * Builds the validator of a declared type once; later calls with the same
 * declaration return the cached instance.
 */
export function compileType<S extends ObjectShape>(schema: ObjectSchema<S>): TypeValidator {
  const cached = typeCache.get(schema);
  if (cached) {
    return cached;
  }

  const fields = schema.fieldNames().map((name) => {
    const declaration: Schema<unknown> = schema.fields[name];
    return FieldValidator.fromDeclaration(
      name,
      schema.externalName(name),
      declaration,
      compileValue(declaration)
    );
  });

  const validator = new TypeValidator(schema.name, fields, schema.constraints);
  typeCache.set(schema, validator);
  return validator;
}
