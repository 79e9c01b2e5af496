import type { JsonValue } from '../errors/types';

export type ConstraintKind =
  | 'minimum'
  | 'maximum'
  | 'exclusiveMinimum'
  | 'exclusiveMaximum'
  | 'multipleOf'
  | 'minLength'
  | 'maxLength'
  | 'pattern'
  | 'minItems'
  | 'maxItems'
  | 'uniqueItems'
  | 'minProperties'
  | 'maxProperties'
  | 'enumerate'
  | 'custom';

export type ConstraintParams = Readonly<Record<string, JsonValue>>;

/**
 * A single constraint failure. Leaf of every error tree.
 */
export interface ConstraintError {
  readonly kind: ConstraintKind;
  readonly message: string;
  /** Lookup key for message catalogs. */
  readonly messageId: string;
  readonly params: ConstraintParams;
  /** External name of the field the failure belongs to, when known. */
  readonly field?: string;
}

export type MessageFormatter = (params: ConstraintParams) => string;

export interface ConstraintOptions {
  readonly message?: string | MessageFormatter;
  readonly messageId?: string;
}

export interface CheckContext {
  readonly field?: string;
}

/**
 * A declared constraint with its parameters fixed. Instances are immutable and
 * may be shared between any number of validation runs.
 */
export interface Constraint<T> {
  readonly kind: ConstraintKind;
  /** Declared parameters, keyed like the matching JSON Schema keyword. */
  readonly params: ConstraintParams;
  check(value: T, context: CheckContext): ConstraintError | undefined;
}
