import type { CheckContext, Constraint, ConstraintError } from '../constraints/types';
import { arrayErrors, newTypeErrors, objectErrors } from '../error-tree/tree';
import type { ErrorTree, ValidationErrors } from '../error-tree/tree';
import { InternalMismatchError } from '../errors/internal-mismatch-error';
import { describeValue, isRecord } from '../utils/guards';

/**
 * Compiled validation of one value. Units are immutable once built and hold no
 * per-run state.
 */
export interface ValueValidator {
  validateValue(value: unknown, context: CheckContext): ValidationErrors | undefined;
}

export function mismatch(expected: string, value: unknown, context: CheckContext): InternalMismatchError {
  const where = context.field !== undefined ? ` in field "${context.field}"` : '';
  return new InternalMismatchError(`expected ${expected}${where}, received ${describeValue(value)}`, {
    stage: 'validating',
    context: { data: { expected, received: describeValue(value), field: context.field ?? null } },
  });
}

export function runConstraints<T>(
  constraints: readonly Constraint<T>[],
  value: T,
  context: CheckContext
): ConstraintError[] {
  const failures: ConstraintError[] = [];
  for (const constraint of constraints) {
    const failure = constraint.check(value, context);
    if (failure) {
      failures.push(failure);
    }
  }
  return failures;
}

export class ScalarValidator<T> implements ValueValidator {
  constructor(
    private readonly expected: string,
    private readonly guard: (value: unknown) => value is T,
    private readonly constraints: readonly Constraint<T>[]
  ) {}

  validateValue(value: unknown, context: CheckContext): ValidationErrors | undefined {
    if (!this.guard(value)) {
      throw mismatch(this.expected, value, context);
    }
    return newTypeErrors(runConstraints(this.constraints, value, context));
  }
}

/**
 * `undefined` and `null` are absence: nothing runs.
 */
export class OptionalValidator implements ValueValidator {
  constructor(private readonly inner: ValueValidator) {}

  validateValue(value: unknown, context: CheckContext): ValidationErrors | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.inner.validateValue(value, context);
  }
}

/**
 * Collection constraints run on the whole array first, then every element is
 * validated on its own and failures are keyed by position.
 */
export class ArrayValidator implements ValueValidator {
  constructor(
    private readonly constraints: readonly Constraint<readonly unknown[]>[],
    private readonly element: ValueValidator
  ) {}

  validateValue(value: unknown, context: CheckContext): ValidationErrors | undefined {
    if (!Array.isArray(value)) {
      throw mismatch('array', value, context);
    }
    const errors = runConstraints(this.constraints, value, context);
    const items = new Map<number, ErrorTree<ConstraintError>>();
    value.forEach((item, index) => {
      const child = this.element.validateValue(item, context);
      if (child) {
        items.set(index, child);
      }
    });
    return arrayErrors(errors, items);
  }
}

export class RecordValidator implements ValueValidator {
  constructor(
    private readonly constraints: readonly Constraint<Readonly<Record<string, unknown>>>[],
    private readonly values: ValueValidator
  ) {}

  validateValue(value: unknown, context: CheckContext): ValidationErrors | undefined {
    if (!isRecord(value)) {
      throw mismatch('object', value, context);
    }
    const errors = runConstraints(this.constraints, value, context);
    const properties = new Map<string, ErrorTree<ConstraintError>>();
    for (const [key, entry] of Object.entries(value)) {
      const child = this.values.validateValue(entry, context);
      if (child) {
        properties.set(key, child);
      }
    }
    return objectErrors(errors, properties);
  }
}
