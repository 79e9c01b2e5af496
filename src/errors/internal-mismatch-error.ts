import { ValidtreeError } from './validtree-error';
import type { PipelineStage } from './pipeline-stage';
import { ErrorContext } from './types';

export interface InternalMismatchErrorOptions {
  stage?: PipelineStage;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * A value passed the structural checks yet does not fit its declaration. This
 * is a defect in the declaration or its schema, never a client error.
 */
export class InternalMismatchError extends ValidtreeError {
  public readonly kind = 'internalMismatch' as const;
  public readonly stage: PipelineStage;

  constructor(message: string, options: InternalMismatchErrorOptions = {}) {
    super({
      message,
      code: 'INTERNAL_SCHEMA_MISMATCH',
      category: 'internal',
      severity: 'fatal',
      context: options.context,
      cause: options.cause,
      retryable: false,
    });
    this.stage = options.stage ?? 'deserializing';
  }
}
