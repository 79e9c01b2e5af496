import { ValidtreeError } from './validtree-error';
import { ErrorContext } from './types';

export interface SchemaViolation {
  /** JSON pointer into the checked value. */
  readonly path: string;
  readonly message: string;
  readonly keyword: string;
}

export interface SchemaErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

function describe(violations: readonly SchemaViolation[]): string {
  return violations.map((violation) => `${violation.path || '/'} ${violation.message}`).join('; ');
}

/**
 * Structural violations found by a JSON Schema check, before any binding.
 */
export class SchemaError extends ValidtreeError {
  public readonly kind = 'schema' as const;
  public readonly stage = 'schemaChecking' as const;
  public readonly violations: readonly SchemaViolation[];

  constructor(violations: readonly SchemaViolation[], options: SchemaErrorOptions = {}) {
    super({
      message: `Schema validation failed: ${describe(violations)}`,
      code: 'VALIDATION_SCHEMA_MISMATCH',
      category: 'validation',
      severity: 'warning',
      context: options.context,
      cause: options.cause,
      retryable: false,
    });
    this.violations = violations;
  }
}
