import { z } from 'zod';
import type { Schema, SchemaVisitor } from '../schema/declarations';

export type Binder = z.ZodType<unknown>;

const binders = new WeakMap<object, Binder>();

/**
 * Structural binding from a decoded wire value to the bound form: external
 * names become field identifiers, `null` on optional values becomes
 * `undefined`, undeclared keys are dropped (or rejected under
 * `denyUnknownFields`). Constraints are not checked here.
 */
const binding: SchemaVisitor<Binder> = {
  number: (schema) => (schema.kind === 'integer' ? z.number().int() : z.number().finite()),
  string: () => z.string(),
  boolean: () => z.boolean(),
  array: (schema) => z.array(binderFor(schema.element)),
  optional: (schema) =>
    binderFor(schema.inner)
      .nullish()
      .transform((value) => value ?? undefined),
  record: (schema) => z.record(z.string(), binderFor(schema.values)),
  object(schema) {
    const pairs = schema.fieldNames().map((field) => [field, schema.externalName(field)] as const);
    const wireShape: Record<string, Binder> = {};
    for (const [field, external] of pairs) {
      wireShape[external] = binderFor(schema.fields[field]);
    }
    const base = z.object(wireShape);
    const wire: z.ZodType<Record<string, unknown>> = schema.config.denyUnknownFields
      ? base.strict()
      : base;
    return wire.transform((value) => {
      const bound: Record<string, unknown> = {};
      for (const [field, external] of pairs) {
        const entry = value[external];
        if (entry !== undefined) {
          bound[field] = entry;
        }
      }
      return bound;
    });
  },
};

export function binderFor(schema: Schema<unknown>): Binder {
  const cached = binders.get(schema);
  if (cached) {
    return cached;
  }
  const binder = schema.accept(binding);
  binders.set(schema, binder);
  return binder;
}
