/**
 * Categories for failures raised by errbox itself.
 */
export type ErrorCategory = 'invariant' | 'config' | 'serialization';

/**
 * Severity levels for library failures.
 */
export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Codes follow the convention `<CATEGORY>_<IDENTIFIER>`.
 */
export type ErrorCode =
  | 'INVARIANT_BACKTRACE_MISSING'
  | 'INVARIANT_CONSUMED'
  | 'CONFIG_INVALID'
  | 'SERIALIZATION_INVALID';

/**
 * Additional diagnostic context included with every library failure.
 */
export interface ErrorContext {
  operation?: string;
  module?: string;
  data?: Record<string, JsonValue>;
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

export interface ErrboxErrorOptions {
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity?: ErrorSeverity;
  context?: ErrorContext;
  cause?: unknown;
}

export interface SerializedErrboxError {
  name: string;
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context?: ErrorContext;
  stack?: string;
  cause?: SerializedErrboxError | string;
}
