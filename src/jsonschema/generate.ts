/**
 * Renders declarations as JSON Schema draft-07 documents for the pre-binding
 * structural check.
 *
 * Only the shape is rendered: types, properties, required keys, element and
 * value schemas, closed objects and nullable optionals. Constraint keywords
 * (bounds, lengths, patterns, enumerations) stay with the validator, so a
 * business-rule violation is reported in the error tree rather than as a
 * schema violation.
 *
 * @module jsonschema/generate
 */

import type { Schema, SchemaVisitor } from '../schema/declarations';
import type { JSONSchema } from './types';

export const DRAFT_07 = 'http://json-schema.org/draft-07/schema#';

const generator: SchemaVisitor<JSONSchema> = {
  number: (schema) => ({ type: schema.kind }),
  string: () => ({ type: 'string' }),
  boolean: () => ({ type: 'boolean' }),
  array: (schema) => ({ type: 'array', items: schema.element.accept(generator) }),
  optional: (schema) => ({ anyOf: [{ type: 'null' }, schema.inner.accept(generator)] }),
  record: (schema) => ({ type: 'object', additionalProperties: schema.values.accept(generator) }),
  object(schema) {
    const properties: Record<string, JSONSchema> = {};
    const required: string[] = [];
    for (const field of schema.fieldNames()) {
      const declaration: Schema<unknown> = schema.fields[field];
      const external = schema.externalName(field);
      properties[external] = declaration.accept(generator);
      if (declaration.kind !== 'optional') {
        required.push(external);
      }
    }
    const rendered: JSONSchema = { title: schema.name, type: 'object', properties };
    if (required.length > 0) {
      rendered.required = required;
    }
    if (schema.config.denyUnknownFields) {
      rendered.additionalProperties = false;
    }
    return rendered;
  },
};

export function toJsonSchema(schema: Schema<unknown>): JSONSchema {
  return schema.accept(generator);
}

/**
 * Standalone document for a declaration, with its `$schema` marker.
 */
export function generateJsonSchema(schema: Schema<unknown>): JSONSchema {
  return { $schema: DRAFT_07, ...toJsonSchema(schema) };
}
