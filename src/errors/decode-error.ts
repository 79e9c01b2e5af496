import { ValidtreeError } from './validtree-error';
import type { PipelineStage } from './pipeline-stage';
import { ErrorCode, ErrorContext } from './types';

export interface DecodeErrorOptions {
  code?: Extract<ErrorCode, 'DECODE_MALFORMED_INPUT' | 'DECODE_SIZE_LIMIT' | 'DECODE_TYPE_MISMATCH'>;
  stage?: Extract<PipelineStage, 'decoding' | 'deserializing'>;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Input that could not be turned into a value of the target type. The message
 * stays generic; parser diagnostics go to `context` only.
 */
export class DecodeError extends ValidtreeError {
  public readonly kind = 'decode' as const;
  public readonly stage: Extract<PipelineStage, 'decoding' | 'deserializing'>;

  constructor(message: string, options: DecodeErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'DECODE_MALFORMED_INPUT',
      category: 'decode',
      severity: 'warning',
      context: options.context,
      cause: options.cause,
      retryable: false,
    });
    this.stage = options.stage ?? 'decoding';
  }
}
