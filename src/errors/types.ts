/**
 * Canonical error categories used across validtree.
 */
export type ErrorCategory =
  | 'decode'
  | 'validation'
  | 'io'
  | 'config'
  | 'internal'
  | 'unknown';

/**
 * Severity levels for categorized errors.
 */
export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Standardised error codes.
 * Codes follow the convention `<CATEGORY>_<IDENTIFIER>`.
 */
export type ErrorCode =
  | 'DECODE_MALFORMED_INPUT'
  | 'DECODE_SIZE_LIMIT'
  | 'DECODE_TYPE_MISMATCH'
  | 'VALIDATION_SCHEMA_MISMATCH'
  | 'VALIDATION_CONSTRAINT_FAILED'
  | 'IO_NOT_FOUND'
  | 'IO_PERMISSION_DENIED'
  | 'IO_SIZE_LIMIT'
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'INTERNAL_SCHEMA_MISMATCH'
  | 'INTERNAL_UNEXPECTED'
  | 'UNKNOWN';

/**
 * Additional diagnostic context included with every error.
 */
export interface ErrorContext {
  operation?: string;
  module?: string;
  correlationId?: string;
  userMessage?: string;
  data?: Record<string, JsonValue>;
  cause?: unknown;
  [key: string]: unknown;
}

/**
 * Lightweight JSON-compatible value definition.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface ValidtreeErrorOptions {
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity?: ErrorSeverity;
  context?: ErrorContext;
  cause?: unknown;
  retryable?: boolean;
}

export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  context?: ErrorContext;
  stack?: string;
  cause?: SerializedError | string;
}
