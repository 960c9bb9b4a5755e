import { ErrorBox } from '../handle/error-box';
import { ErrorLogger, LogContext, currentLogger, useLogger } from './logger';

export interface CaptureOptions {
  logger?: ErrorLogger;
  context?: LogContext;
  rethrow?: boolean;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: ErrorBox; correlationId: string };

/**
 * Boundary helpers that box, log and return whatever an operation throws.
 */
export class ErrorHandler {
  static useLogger(logger: ErrorLogger): void {
    useLogger(logger);
  }

  static capture<T>(operation: string, fn: () => T, options: CaptureOptions = {}): Outcome<T> {
    try {
      return { ok: true, value: fn() };
    } catch (error) {
      return this.report(error, operation, options);
    }
  }

  static async captureAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    options: CaptureOptions = {}
  ): Promise<Outcome<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (error) {
      return this.report(error, operation, options);
    }
  }

  private static report(
    thrown: unknown,
    operation: string,
    options: CaptureOptions
  ): { ok: false; error: ErrorBox; correlationId: string } {
    const logger = options.logger ?? currentLogger();
    const error = ErrorBox.from(thrown);
    const correlationId = logger.logError(error, {
      ...options.context,
      operation,
    });

    if (options.rethrow ?? false) {
      throw error;
    }

    return { ok: false, error, correlationId };
  }
}
