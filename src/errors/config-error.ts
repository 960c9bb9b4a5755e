import { ErrboxError } from './errbox-error';
import { ErrorContext, ErrorSeverity } from './types';

export interface ConfigErrorOptions {
  context?: ErrorContext;
  severity?: ErrorSeverity;
  cause?: unknown;
}

export class ConfigError extends ErrboxError {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super({
      message,
      code: 'CONFIG_INVALID',
      category: 'config',
      severity: options.severity ?? 'error',
      context: options.context,
      cause: options.cause,
    });
  }
}
