import type { ValidationErrors } from '../error-tree/tree';
import type { Schema, SchemaVisitor } from '../schema/declarations';
import type { ValueValidator } from './units';

/**
 * Structural wrapping of a field's value. Deeper nestings are reported by
 * their two outermost wrappers.
 */
export type FieldShape = 'scalar' | 'array' | 'optional' | 'arrayOfOptional' | 'optionalOfArray';

type Layer =
  | { readonly wrapper: 'array' | 'optional'; readonly inner: Schema<unknown> }
  | { readonly wrapper: 'none'; readonly nested: boolean };

const layerOf: SchemaVisitor<Layer> = {
  number: () => ({ wrapper: 'none', nested: false }),
  string: () => ({ wrapper: 'none', nested: false }),
  boolean: () => ({ wrapper: 'none', nested: false }),
  array: (schema) => ({ wrapper: 'array', inner: schema.element }),
  optional: (schema) => ({ wrapper: 'optional', inner: schema.inner }),
  record: () => ({ wrapper: 'none', nested: false }),
  object: () => ({ wrapper: 'none', nested: true }),
};

export function fieldShape(schema: Schema<unknown>): FieldShape {
  const outer = schema.accept(layerOf);
  if (outer.wrapper === 'none') {
    return 'scalar';
  }
  const inner = outer.inner.accept(layerOf).wrapper;
  if (outer.wrapper === 'array') {
    return inner === 'optional' ? 'arrayOfOptional' : 'array';
  }
  return inner === 'array' ? 'optionalOfArray' : 'optional';
}

/**
 * Whether the innermost value, under any array and optional wrappers, is a
 * declared type with its own validator.
 */
export function isNestedValidatable(schema: Schema<unknown>): boolean {
  const layer = schema.accept(layerOf);
  return layer.wrapper === 'none' ? layer.nested : isNestedValidatable(layer.inner);
}

export interface FieldValidatorInit {
  readonly field: string;
  readonly externalName: string;
  readonly shape: FieldShape;
  readonly nested: boolean;
  readonly validator: ValueValidator;
}

/**
 * Validation of one field of a declared type. Produces at most one error node,
 * shaped like the field's value.
 *
 * `shape` and `nested` describe the declaration for introspection; `validate`
 * delegates to the compiled unit and does not consult them.
 */
export class FieldValidator {
  readonly field: string;
  readonly externalName: string;
  readonly shape: FieldShape;
  readonly nested: boolean;
  private readonly validator: ValueValidator;

  constructor(init: FieldValidatorInit) {
    this.field = init.field;
    this.externalName = init.externalName;
    this.shape = init.shape;
    this.nested = init.nested;
    this.validator = init.validator;
  }

  static fromDeclaration(
    field: string,
    externalName: string,
    declaration: Schema<unknown>,
    validator: ValueValidator
  ): FieldValidator {
    return new FieldValidator({
      field,
      externalName,
      shape: fieldShape(declaration),
      nested: isNestedValidatable(declaration),
      validator,
    });
  }

  /**
   * `instance` is the bound value, keyed by field identifier.
   */
  validate(instance: Readonly<Record<string, unknown>>): ValidationErrors | undefined {
    return this.validator.validateValue(instance[this.field], { field: this.externalName });
  }
}
