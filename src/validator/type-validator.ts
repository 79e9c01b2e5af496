import type { CheckContext, Constraint, ConstraintError } from '../constraints/types';
import { objectErrors } from '../error-tree/tree';
import type { ErrorTree, ValidationErrors } from '../error-tree/tree';
import { isRecord } from '../utils/guards';
import type { FieldValidator } from './field-validator';
import { mismatch, runConstraints } from './units';
import type { ValueValidator } from './units';

type Rule = Constraint<Readonly<Record<string, unknown>>>;

/**
 * Whole-instance validation of one declared type. Every field runs, then the
 * whole-object rules, whatever the fields reported.
 */
export class TypeValidator implements ValueValidator {
  constructor(
    readonly typeName: string,
    readonly fields: readonly FieldValidator[],
    private readonly rules: readonly Rule[]
  ) {}

  validate(instance: unknown): ValidationErrors | undefined {
    return this.validateValue(instance, {});
  }

  validateValue(value: unknown, context: CheckContext): ValidationErrors | undefined {
    if (!isRecord(value)) {
      throw mismatch(this.typeName, value, context);
    }

    const properties = new Map<string, ErrorTree<ConstraintError>>();
    for (const field of this.fields) {
      const result = field.validate(value);
      if (result) {
        properties.set(field.externalName, result);
      }
    }

    const errors = runConstraints(this.rules, value, {});
    return objectErrors(errors, properties);
  }
}
