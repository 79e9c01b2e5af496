import { ErrorHandler } from '../errors/handler';
import type { PipelineError } from '../errors/pipeline-error';
import { ValidatedDecodePipeline } from '../pipeline/pipeline';
import type { PipelineOptions } from '../pipeline/pipeline';
import { toErrorResponse } from '../pipeline/response';
import type { ErrorBodyOptions, ErrorResponse } from '../pipeline/response';
import type { InferShape, ObjectSchema, ObjectShape } from '../schema/declarations';
import type { RawInput } from './decoders';

export type BodyResult<TResult> =
  | { readonly ok: true; readonly result: TResult }
  | { readonly ok: false; readonly response: ErrorResponse; readonly error: PipelineError };

export interface ValidateBodyOptions extends PipelineOptions, ErrorBodyOptions {}

/**
 * Wraps a handler so it receives a validated value instead of the raw body.
 * Rejections become the uniform error response; the handler is not called.
 */
export function validateBody<S extends ObjectShape>(
  type: ObjectSchema<S>,
  options: ValidateBodyOptions = {}
): <Args extends unknown[], TResult>(
  handler: (input: InferShape<S>, ...rest: Args) => TResult | Promise<TResult>
) => (body: RawInput | Promise<RawInput>, ...rest: Args) => Promise<BodyResult<TResult>> {
  const pipeline = new ValidatedDecodePipeline(type, options);

  return function <Args extends unknown[], TResult>(
    handler: (input: InferShape<S>, ...rest: Args) => TResult | Promise<TResult>
  ): (body: RawInput | Promise<RawInput>, ...rest: Args) => Promise<BodyResult<TResult>> {
    return async (body: RawInput | Promise<RawInput>, ...rest: Args): Promise<BodyResult<TResult>> => {
      let raw: RawInput;
      try {
        raw = await body;
      } catch (error) {
        throw ErrorHandler.handle(error, 'validateBody', {}, {
          module: 'validation/middleware',
          category: 'io',
          logger: options.logger,
          userMessage: 'Failed to read request body',
        });
      }

      const outcome = pipeline.run(raw);
      if (!outcome.ok) {
        return {
          ok: false,
          response: toErrorResponse(outcome.error, options),
          error: outcome.error,
        };
      }
      return { ok: true, result: await handler(outcome.value, ...rest) };
    };
  };
}
