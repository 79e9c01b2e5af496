/**
 * Declarations: the immutable description of a validatable type.
 *
 * Every builder method returns a new declaration. Validators, JSON Schemas and
 * binders are derived from a declaration on first use and cached against it.
 *
 * @module schema/declarations
 */

import { maxItems, minItems, uniqueItems } from '../constraints/array';
import { custom, enumerate } from '../constraints/generic';
import type { CustomCheck } from '../constraints/generic';
import {
  exclusiveMaximum,
  exclusiveMinimum,
  maximum,
  minimum,
  multipleOf,
} from '../constraints/numeric';
import { maxProperties, minProperties } from '../constraints/object';
import { maxLength, minLength, pattern } from '../constraints/string';
import type { Constraint, ConstraintOptions } from '../constraints/types';
import type { ValidationErrors } from '../error-tree/tree';
import { InternalMismatchError } from '../errors/internal-mismatch-error';
import { conformsTo } from '../validation/conforms';
import { compileType } from '../validator/compile';
import type { TypeValidator } from '../validator/type-validator';

export type SchemaKind =
  | 'integer'
  | 'number'
  | 'string'
  | 'boolean'
  | 'array'
  | 'optional'
  | 'record'
  | 'object';

export interface SchemaVisitor<R> {
  number(schema: NumberSchema): R;
  string(schema: StringSchema): R;
  boolean(schema: BooleanSchema): R;
  array<E extends Schema<unknown>>(schema: ArraySchema<E>): R;
  optional<I extends Schema<unknown>>(schema: OptionalSchema<I>): R;
  record<V extends Schema<unknown>>(schema: RecordSchema<V>): R;
  object<S extends ObjectShape>(schema: ObjectSchema<S>): R;
}

export abstract class Schema<T> {
  declare readonly _output: T;
  abstract readonly kind: SchemaKind;

  abstract accept<R>(visitor: SchemaVisitor<R>): R;

  /**
   * Structural test of a runtime value against this declaration.
   */
  conforms(value: unknown): value is T {
    return conformsTo(this, value);
  }

  /** Absent or `null` values skip every constraint. */
  optional(): OptionalSchema<this> {
    return new OptionalSchema(this);
  }

  array(): ArraySchema<this> {
    return new ArraySchema(this, []);
  }
}

export type Infer<S extends Schema<unknown>> = S['_output'];

/**
 * Declarations that carry their own constraint list.
 *
 * `C` is the type constraints are checked against: the value type itself for
 * scalars, a plain array or record for composites. `Self` keeps chained calls
 * on the concrete declaration type.
 */
export abstract class ConstrainedSchema<T, C, Self extends ConstrainedSchema<T, C, Self>> extends Schema<T> {
  protected constructor(readonly constraints: readonly Constraint<C>[]) {
    super();
  }

  protected abstract withConstraints(constraints: readonly Constraint<C>[]): Self;

  protected add(constraint: Constraint<C>): Self {
    return this.withConstraints([...this.constraints, constraint]);
  }

  protected addCustom<A extends readonly unknown[]>(
    check: CustomCheck<T, A>,
    args: A,
    options?: ConstraintOptions
  ): Self {
    const typed = (value: C, ...rest: A) => {
      if (!this.conforms(value)) {
        throw new InternalMismatchError(`value does not match its ${this.kind} declaration`, {
          stage: 'validating',
        });
      }
      return check(value, ...rest);
    };
    return this.add(custom(typed, args, options));
  }

  /**
   * Attach a user predicate. `args` are passed after the value on every call.
   */
  custom<A extends readonly unknown[]>(check: CustomCheck<T, A>, ...args: A): Self {
    return this.addCustom(check, args);
  }
}

export class NumberSchema extends ConstrainedSchema<number, number, NumberSchema> {
  constructor(
    readonly kind: 'integer' | 'number',
    constraints: readonly Constraint<number>[]
  ) {
    super(constraints);
  }

  protected withConstraints(constraints: readonly Constraint<number>[]): NumberSchema {
    return new NumberSchema(this.kind, constraints);
  }

  accept<R>(visitor: SchemaVisitor<R>): R {
    return visitor.number(this);
  }

  minimum(limit: number, options?: ConstraintOptions): NumberSchema {
    return this.add(minimum(limit, options));
  }

  maximum(limit: number, options?: ConstraintOptions): NumberSchema {
    return this.add(maximum(limit, options));
  }

  exclusiveMinimum(limit: number, options?: ConstraintOptions): NumberSchema {
    return this.add(exclusiveMinimum(limit, options));
  }

  exclusiveMaximum(limit: number, options?: ConstraintOptions): NumberSchema {
    return this.add(exclusiveMaximum(limit, options));
  }

  multipleOf(divisor: number, options?: ConstraintOptions): NumberSchema {
    return this.add(multipleOf(divisor, options));
  }

  enumerate(members: readonly number[], options?: ConstraintOptions): NumberSchema {
    return this.add(enumerate(members, options));
  }
}

export class StringSchema extends ConstrainedSchema<string, string, StringSchema> {
  readonly kind = 'string' as const;

  constructor(constraints: readonly Constraint<string>[]) {
    super(constraints);
  }

  protected withConstraints(constraints: readonly Constraint<string>[]): StringSchema {
    return new StringSchema(constraints);
  }

  accept<R>(visitor: SchemaVisitor<R>): R {
    return visitor.string(this);
  }

  minLength(limit: number, options?: ConstraintOptions): StringSchema {
    return this.add(minLength(limit, options));
  }

  maxLength(limit: number, options?: ConstraintOptions): StringSchema {
    return this.add(maxLength(limit, options));
  }

  pattern(source: string | RegExp, options?: ConstraintOptions): StringSchema {
    return this.add(pattern(source, options));
  }

  enumerate(members: readonly string[], options?: ConstraintOptions): StringSchema {
    return this.add(enumerate(members, options));
  }
}

export class BooleanSchema extends ConstrainedSchema<boolean, boolean, BooleanSchema> {
  readonly kind = 'boolean' as const;

  constructor(constraints: readonly Constraint<boolean>[]) {
    super(constraints);
  }

  protected withConstraints(constraints: readonly Constraint<boolean>[]): BooleanSchema {
    return new BooleanSchema(constraints);
  }

  accept<R>(visitor: SchemaVisitor<R>): R {
    return visitor.boolean(this);
  }

  enumerate(members: readonly boolean[], options?: ConstraintOptions): BooleanSchema {
    return this.add(enumerate(members, options));
  }
}

export type ItemList = readonly unknown[];

export class ArraySchema<E extends Schema<unknown>> extends ConstrainedSchema<
  Infer<E>[],
  ItemList,
  ArraySchema<E>
> {
  readonly kind = 'array' as const;

  constructor(
    readonly element: E,
    constraints: readonly Constraint<ItemList>[]
  ) {
    super(constraints);
  }

  protected withConstraints(constraints: readonly Constraint<ItemList>[]): ArraySchema<E> {
    return new ArraySchema(this.element, constraints);
  }

  accept<R>(visitor: SchemaVisitor<R>): R {
    return visitor.array(this);
  }

  minItems(limit: number, options?: ConstraintOptions): ArraySchema<E> {
    return this.add(minItems(limit, options));
  }

  maxItems(limit: number, options?: ConstraintOptions): ArraySchema<E> {
    return this.add(maxItems(limit, options));
  }

  uniqueItems(options?: ConstraintOptions): ArraySchema<E> {
    return this.add(uniqueItems(options));
  }
}

export class OptionalSchema<I extends Schema<unknown>> extends Schema<Infer<I> | undefined> {
  readonly kind = 'optional' as const;

  constructor(readonly inner: I) {
    super();
  }

  accept<R>(visitor: SchemaVisitor<R>): R {
    return visitor.optional(this);
  }
}

export type PropertyBag = Readonly<Record<string, unknown>>;

export class RecordSchema<V extends Schema<unknown>> extends ConstrainedSchema<
  Record<string, Infer<V>>,
  PropertyBag,
  RecordSchema<V>
> {
  readonly kind = 'record' as const;

  constructor(
    readonly values: V,
    constraints: readonly Constraint<PropertyBag>[]
  ) {
    super(constraints);
  }

  protected withConstraints(constraints: readonly Constraint<PropertyBag>[]): RecordSchema<V> {
    return new RecordSchema(this.values, constraints);
  }

  accept<R>(visitor: SchemaVisitor<R>): R {
    return visitor.record(this);
  }

  minProperties(limit: number, options?: ConstraintOptions): RecordSchema<V> {
    return this.add(minProperties(limit, options));
  }

  maxProperties(limit: number, options?: ConstraintOptions): RecordSchema<V> {
    return this.add(maxProperties(limit, options));
  }
}

export type ObjectShape = { readonly [field: string]: Schema<unknown> };

type OptionalKeys<S extends ObjectShape> = {
  [K in keyof S]: S[K] extends OptionalSchema<Schema<unknown>> ? K : never;
}[keyof S];

type RequiredKeys<S extends ObjectShape> = Exclude<keyof S, OptionalKeys<S>>;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

export type InferShape<S extends ObjectShape> = Simplify<
  { [K in RequiredKeys<S>]: Infer<S[K]> } & { [K in OptionalKeys<S>]?: Infer<S[K]> }
>;

export interface ObjectOptions<S extends ObjectShape> {
  /** External (wire) name per field identifier. */
  readonly rename?: { readonly [K in keyof S]?: string };
  /** Reject keys that name no field, in both the schema check and binding. */
  readonly denyUnknownFields?: boolean;
}

export interface ObjectConfig {
  readonly renames: ReadonlyMap<string, string>;
  readonly denyUnknownFields: boolean;
}

export function objectConfig<S extends ObjectShape>(options: ObjectOptions<S>): ObjectConfig {
  const renames = new Map<string, string>();
  for (const [field, external] of Object.entries(options.rename ?? {})) {
    if (typeof external === 'string') {
      renames.set(field, external);
    }
  }
  return { renames, denyUnknownFields: options.denyUnknownFields ?? false };
}

/**
 * Capability of anything that can validate an instance of `T`.
 */
export interface Validatable<T> {
  validate(instance: T): ValidationErrors | undefined;
}

export type CheckResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly errors: ValidationErrors };

/**
 * A declared composite type. Its own constraints are whole-object rules, run
 * after the fields regardless of their outcome.
 */
export class ObjectSchema<S extends ObjectShape>
  extends ConstrainedSchema<InferShape<S>, PropertyBag, ObjectSchema<S>>
  implements Validatable<InferShape<S>>
{
  readonly kind = 'object' as const;

  constructor(
    readonly name: string,
    readonly fields: S,
    readonly config: ObjectConfig,
    constraints: readonly Constraint<PropertyBag>[]
  ) {
    super(constraints);
  }

  protected withConstraints(constraints: readonly Constraint<PropertyBag>[]): ObjectSchema<S> {
    return new ObjectSchema(this.name, this.fields, this.config, constraints);
  }

  accept<R>(visitor: SchemaVisitor<R>): R {
    return visitor.object(this);
  }

  /**
   * Field identifiers in declaration order.
   */
  fieldNames(): string[] {
    return Object.keys(this.fields);
  }

  externalName(field: string): string {
    return this.config.renames.get(field) ?? field;
  }

  rule(check: CustomCheck<InferShape<S>, []>, options?: ConstraintOptions): ObjectSchema<S> {
    return this.addCustom(check, [], options);
  }

  validator(): TypeValidator {
    return compileType(this);
  }

  validate(instance: InferShape<S>): ValidationErrors | undefined {
    return this.validator().validate(instance);
  }

  check(instance: InferShape<S>): CheckResult {
    const errors = this.validate(instance);
    return errors ? { valid: false, errors } : { valid: true };
  }
}
