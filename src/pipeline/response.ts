import { flattenErrors } from '../error-tree/flatten';
import type { FlatError } from '../error-tree/flatten';
import { localizeErrors } from '../error-tree/localize';
import type { Translator } from '../error-tree/localize';
import type { PipelineError } from '../errors/pipeline-error';

export const INVALID_BODY_MESSAGE = 'invalid request body';
export const INVALID_REQUEST_MESSAGE = 'invalid request';

export const CLIENT_ERROR_STATUS = 400;

export interface ErrorBody {
  readonly errors: readonly FlatError[];
}

export interface ErrorResponse {
  readonly status: typeof CLIENT_ERROR_STATUS;
  readonly body: ErrorBody;
}

export interface ErrorBodyOptions {
  /** Localizes constraint failures; other kinds are unaffected. */
  readonly translator?: Translator;
}

/**
 * One envelope for every failure kind. Decode and internal failures never
 * expose their diagnostics.
 */
export function toErrorBody(error: PipelineError, options: ErrorBodyOptions = {}): ErrorBody {
  switch (error.kind) {
    case 'decode':
      return { errors: [{ path: '', message: INVALID_BODY_MESSAGE }] };
    case 'internalMismatch':
      return { errors: [{ path: '', message: INVALID_REQUEST_MESSAGE }] };
    case 'schema':
      return {
        errors: error.violations.map((violation) => ({
          path: violation.path,
          message: violation.message,
        })),
      };
    case 'validation': {
      const tree = options.translator
        ? localizeErrors(error.errors, options.translator)
        : error.errors;
      return { errors: flattenErrors(tree) };
    }
  }
}

export function toErrorResponse(error: PipelineError, options: ErrorBodyOptions = {}): ErrorResponse {
  return { status: CLIENT_ERROR_STATUS, body: toErrorBody(error, options) };
}
