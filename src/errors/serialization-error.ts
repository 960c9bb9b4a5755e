import { ErrboxError } from './errbox-error';
import { ErrorContext } from './types';

export interface SerializationErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class SerializationError extends ErrboxError {
  constructor(message: string, options: SerializationErrorOptions = {}) {
    super({
      message,
      code: 'SERIALIZATION_INVALID',
      category: 'serialization',
      context: options.context,
      cause: options.cause,
    });
  }
}
