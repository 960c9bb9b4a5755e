import {
  ErrboxErrorOptions,
  ErrorCategory,
  ErrorCode,
  ErrorContext,
  ErrorSeverity,
  SerializedErrboxError,
} from './types';

/**
 * Base class for failures raised by the library itself, as opposed to the
 * errors it carries.
 */
export class ErrboxError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly cause?: unknown;

  constructor(options: ErrboxErrorOptions) {
    super(options.message);
    this.name = new.target.name;
    this.code = options.code;
    this.category = options.category;
    this.severity = options.severity ?? 'error';
    this.context = options.context;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): SerializedErrboxError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      stack: this.stack,
      cause: this.serializeCause(this.cause),
    };
  }

  static isErrboxError(error: unknown): error is ErrboxError {
    return error instanceof ErrboxError;
  }

  private serializeCause(cause: unknown): SerializedErrboxError | string | undefined {
    if (!cause) {
      return undefined;
    }

    if (cause instanceof ErrboxError) {
      return cause.toJSON();
    }

    if (cause instanceof Error) {
      return `${cause.name}: ${cause.message}`;
    }

    if (typeof cause === 'string') {
      return cause;
    }

    try {
      return JSON.stringify(cause);
    } catch (serializationError) {
      return `Unserializable cause: ${serializationError}`;
    }
  }
}
