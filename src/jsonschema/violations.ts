import type { ErrorObject } from 'ajv';
import { joinPointer } from '../error-tree/flatten';
import type { SchemaViolation } from '../errors/schema-error';

/**
 * Pointer of the value a violation is about. `required` and
 * `additionalProperties` report on the parent object; they are moved onto
 * the property they name.
 */
function violationPath(error: ErrorObject): string {
  const property: unknown =
    error.keyword === 'required'
      ? error.params.missingProperty
      : error.keyword === 'additionalProperties'
        ? error.params.additionalProperty
        : undefined;
  return typeof property === 'string' ? joinPointer(error.instancePath, property) : error.instancePath;
}

export function toSchemaViolation(error: ErrorObject): SchemaViolation {
  return {
    path: violationPath(error),
    message: error.message ?? `must pass "${error.keyword}" keyword validation`,
    keyword: error.keyword,
  };
}

export function toSchemaViolations(errors: readonly ErrorObject[] | null | undefined): SchemaViolation[] {
  return (errors ?? []).map((error) => toSchemaViolation(error));
}
