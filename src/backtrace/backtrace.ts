import { getBacktraceConfig } from '../config/backtrace-config';
import { StackFrame, formatStackFrame, parseStackFrames } from './stack-frames';

/**
 * Why a backtrace does or does not carry frames.
 */
export type BacktraceStatus = 'captured' | 'disabled' | 'unsupported';

export interface SerializedBacktrace {
  status: BacktraceStatus;
  frames: StackFrame[];
}

/**
 * An immutable stack trace snapshot.
 */
export class Backtrace {
  private constructor(
    public readonly status: BacktraceStatus,
    public readonly frames: readonly StackFrame[]
  ) {}

  /**
   * Capture the current stack, honouring the process-wide configuration.
   * Frames above the most recent call to `skipAbove` (and that call itself)
   * are omitted.
   */
  static capture(skipAbove?: Function): Backtrace {
    const config = getBacktraceConfig();
    if (!config.enabled) {
      return Backtrace.disabled();
    }

    const holder: { stack?: string } = {};
    if (Error.captureStackTrace) {
      const previousLimit = Error.stackTraceLimit;
      Error.stackTraceLimit = config.frameLimit;
      try {
        Error.captureStackTrace(holder, skipAbove ?? Backtrace.capture);
      } finally {
        Error.stackTraceLimit = previousLimit;
      }
    } else {
      holder.stack = new Error().stack;
    }

    if (typeof holder.stack !== 'string') {
      return Backtrace.unsupported();
    }
    return new Backtrace('captured', parseStackFrames(holder.stack));
  }

  static disabled(): Backtrace {
    return new Backtrace('disabled', []);
  }

  static unsupported(): Backtrace {
    return new Backtrace('unsupported', []);
  }

  /**
   * Build a backtrace from an existing stack string, for error types that
   * already carry one (`error.stack`).
   */
  static fromStack(stack: string | undefined): Backtrace {
    if (stack === undefined) {
      return Backtrace.unsupported();
    }
    return new Backtrace('captured', parseStackFrames(stack));
  }

  static fromJSON(data: SerializedBacktrace): Backtrace {
    if (data.status !== 'captured') {
      return new Backtrace(data.status, []);
    }
    return new Backtrace(
      'captured',
      data.frames.map((frame) => ({ ...frame }))
    );
  }

  toJSON(): SerializedBacktrace {
    return {
      status: this.status,
      frames: this.frames.map((frame) => ({ ...frame })),
    };
  }

  toString(): string {
    switch (this.status) {
      case 'captured':
        return ['stack backtrace:', ...this.frames.map(formatStackFrame)].join('\n');
      case 'disabled':
        return 'disabled backtrace';
      case 'unsupported':
        return 'unsupported backtrace';
    }
  }
}
