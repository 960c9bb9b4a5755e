import { ErrboxError } from './errbox-error';
import { ErrorCode, ErrorContext } from './types';

export interface InvariantErrorOptions {
  code: Extract<ErrorCode, 'INVARIANT_BACKTRACE_MISSING' | 'INVARIANT_CONSUMED'>;
  context?: ErrorContext;
}

/**
 * A broken internal guarantee. Always fatal: it signals a bug in errbox or a
 * handle used after it was consumed, never an expected outcome.
 */
export class InvariantError extends ErrboxError {
  constructor(message: string, options: InvariantErrorOptions) {
    super({
      message,
      code: options.code,
      category: 'invariant',
      severity: 'fatal',
      context: options.context,
    });
  }
}
