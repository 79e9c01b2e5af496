import { DecodeError } from './decode-error';
import { InternalMismatchError } from './internal-mismatch-error';
import { SchemaError } from './schema-error';
import { ValidationError } from './validation-error';

export type PipelineError = DecodeError | SchemaError | ValidationError | InternalMismatchError;

export function isPipelineError(error: unknown): error is PipelineError {
  return (
    error instanceof DecodeError ||
    error instanceof SchemaError ||
    error instanceof ValidationError ||
    error instanceof InternalMismatchError
  );
}
