import type { Schema, SchemaVisitor } from '../schema/declarations';
import { isFiniteNumber, isInteger, isRecord } from '../utils/guards';

type Predicate = (value: unknown) => boolean;

const predicates = new WeakMap<object, Predicate>();

const conformance: SchemaVisitor<Predicate> = {
  number: (schema) => (schema.kind === 'integer' ? isInteger : isFiniteNumber),
  string: () => (value) => typeof value === 'string',
  boolean: () => (value) => typeof value === 'boolean',
  array(schema) {
    const element = predicateOf(schema.element);
    return (value) => Array.isArray(value) && value.every((item) => element(item));
  },
  optional(schema) {
    const inner = predicateOf(schema.inner);
    return (value) => value === undefined || value === null || inner(value);
  },
  record(schema) {
    const entry = predicateOf(schema.values);
    return (value) => isRecord(value) && Object.values(value).every((item) => entry(item));
  },
  object(schema) {
    const fields = schema
      .fieldNames()
      .map((name): [string, Predicate] => [name, predicateOf(schema.fields[name])]);
    return (value) => isRecord(value) && fields.every(([name, test]) => test(value[name]));
  },
};

function predicateOf(schema: Schema<unknown>): Predicate {
  const cached = predicates.get(schema);
  if (cached) {
    return cached;
  }
  const predicate = schema.accept(conformance);
  predicates.set(schema, predicate);
  return predicate;
}

/**
 * Structural test of a bound value (keys are field identifiers). Constraints
 * are not evaluated.
 */
export function conformsTo(schema: Schema<unknown>, value: unknown): boolean {
  return predicateOf(schema)(value);
}
