import { flattenErrors } from '../error-tree/flatten';
import type { FlatError } from '../error-tree/flatten';
import { serializeErrors } from '../error-tree/serialize';
import type { ValidationErrors } from '../error-tree/tree';
import { ValidtreeError } from './validtree-error';
import { ErrorContext } from './types';

export interface ValidationErrorOptions {
  context?: ErrorContext;
}

/**
 * Constraint violations on a bound value. The message is the JSON body form of
 * the tree.
 */
export class ValidationError extends ValidtreeError {
  public readonly kind = 'validation' as const;
  public readonly stage = 'validating' as const;
  public readonly errors: ValidationErrors;

  constructor(errors: ValidationErrors, options: ValidationErrorOptions = {}) {
    super({
      message: JSON.stringify(serializeErrors(errors)),
      code: 'VALIDATION_CONSTRAINT_FAILED',
      category: 'validation',
      severity: 'warning',
      context: options.context,
      retryable: false,
    });
    this.errors = errors;
  }

  flatten(): FlatError[] {
    return flattenErrors(this.errors);
  }
}
