import { ValidtreeError } from './validtree-error';
import { ErrorLogger } from './logger';
import { ErrorCategory, ErrorCode, ErrorContext, ErrorSeverity } from './types';

export interface WrapOptions {
  module?: string;
  category?: ErrorCategory;
  code?: ErrorCode;
  severity?: ErrorSeverity;
  userMessage?: string;
  fallbackMessage?: string;
}

export interface HandleOptions extends WrapOptions {
  logger?: ErrorLogger;
  rethrow?: boolean;
}

/**
 * A `ValidtreeError` is kept and gains the context; anything else is wrapped.
 */
function normalizeError(error: unknown, context: ErrorContext, options: WrapOptions): ValidtreeError {
  if (error instanceof ValidtreeError) {
    error.context = { ...error.context, ...context };
    return error;
  }

  if (error instanceof Error) {
    return new ValidtreeError({
      message: options.fallbackMessage ?? error.message,
      code: options.code ?? 'INTERNAL_UNEXPECTED',
      category: options.category ?? 'internal',
      severity: options.severity,
      context: { ...context, cause: error.stack ?? error.message },
      cause: error,
    });
  }

  return new ValidtreeError({
    message: options.fallbackMessage ?? 'Unknown error',
    code: options.code ?? 'UNKNOWN',
    category: options.category ?? 'unknown',
    severity: options.severity,
    context,
    cause: error,
  });
}

export class ErrorHandler {
  private static readonly logger = new ErrorLogger();

  static wrap(
    error: unknown,
    operation: string,
    context: ErrorContext = {},
    options: WrapOptions = {}
  ): ValidtreeError {
    const baseContext: ErrorContext = {
      ...context,
      operation,
    };

    if (options.module) {
      baseContext.module = options.module;
    }

    if (options.userMessage) {
      baseContext.userMessage = options.userMessage;
    }

    const normalized = normalizeError(error, baseContext, options);

    if (options.fallbackMessage) {
      normalized.message = options.fallbackMessage;
    }

    return normalized;
  }

  /**
   * Wrap, log, then rethrow unless `rethrow` is false.
   */
  static handle(
    error: unknown,
    operation: string,
    context: ErrorContext = {},
    options: HandleOptions = {}
  ): ValidtreeError {
    const logger = options.logger ?? this.logger;
    const wrapped = this.wrap(error, operation, context, options);
    const correlationId = logger.logError(wrapped, wrapped.context);
    wrapped.context = {
      ...wrapped.context,
      correlationId,
    };

    if (options.rethrow ?? true) {
      throw wrapped;
    }

    return wrapped;
  }
}
