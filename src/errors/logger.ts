import { randomUUID } from 'crypto';
import type { ErrorBox } from '../handle/error-box';
import { displayOf } from '../handle/behavior';

export interface LogSink {
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Context attached to a log entry. Never stored on the error itself.
 */
export interface LogContext {
  operation?: string;
  module?: string;
  correlationId?: string;
  [key: string]: unknown;
}

const DEFAULT_SINK: LogSink = console;

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function generateCorrelationId(): string {
  try {
    return randomUUID();
  } catch {
    const rand = Math.random().toString(36).slice(2, 10);
    return `cid-${Date.now().toString(36)}-${rand}`;
  }
}

export class ErrorLogger {
  constructor(private readonly sink: LogSink = DEFAULT_SINK) {}

  /**
   * Ensures a correlation identifier exists and returns it.
   */
  ensureCorrelationId(context?: LogContext): string {
    if (context?.correlationId && typeof context.correlationId === 'string') {
      return context.correlationId;
    }
    return generateCorrelationId();
  }

  /**
   * Emit a structured log entry for a boxed error.
   */
  logError(error: ErrorBox, context: LogContext = {}): string {
    const correlationId = this.ensureCorrelationId(context);
    const backtrace = error.backtrace();
    const message = error.display();

    const payload = {
      level: 'error',
      timestamp: new Date().toISOString(),
      correlationId,
      message,
      chain: Array.from(error.chain(), (link, index) =>
        index === 0 ? message : displayOf(link)
      ),
      backtrace: backtrace.status,
      stack: backtrace.status === 'captured' ? backtrace.toString() : undefined,
      context: { ...context, correlationId },
    };

    const serialized = safeStringify(payload);
    if (serialized) {
      this.sink.error(serialized);
    } else {
      this.sink.error(
        `[${payload.timestamp}] [ERROR] ${message} (correlationId=${correlationId})`
      );
    }

    return correlationId;
  }

  logWarning(message: string, context: LogContext = {}): string {
    const correlationId = this.ensureCorrelationId(context);
    const payload = {
      level: 'warn',
      timestamp: new Date().toISOString(),
      correlationId,
      message,
      context,
    };
    const serialized = safeStringify(payload);
    if (serialized) {
      this.sink.warn(serialized);
    } else {
      this.sink.warn(`[${payload.timestamp}] [WARN] ${message} (correlationId=${correlationId})`);
    }
    return correlationId;
  }
}

let activeLogger = new ErrorLogger();

/**
 * Replace the process-wide logger used for library diagnostics.
 */
export function useLogger(logger: ErrorLogger): void {
  activeLogger = logger;
}

export function currentLogger(): ErrorLogger {
  return activeLogger;
}
