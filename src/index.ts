/**
 * errbox: a type-erased, backtrace-carrying error handle.
 *
 * @module index
 */

export { ErrorBox } from './handle/error-box';
export type { Downcast } from './handle/error-box';
export { ErrorChain } from './handle/chain';
export { RemoteError } from './handle/remote-error';
export type { RemoteErrorInit } from './handle/remote-error';
export { DISABLED_BACKTRACE_NOTICE, formatDebug } from './handle/debug-format';
export { debugOf, displayOf, isErrorValue, sourceOf } from './handle/behavior';
export type { ErrorHooks, ErrorValue, Message, Reportable } from './handle/behavior';
export { typeIdOf } from './handle/type-id';
export type { Concrete, TypeId } from './handle/type-id';
export type { SerializedErrorBox, SerializedLink } from './handle/serialization';

export { Backtrace } from './backtrace/backtrace';
export type { BacktraceStatus, SerializedBacktrace } from './backtrace/backtrace';
export type { StackFrame } from './backtrace/stack-frames';

export {
  BACKTRACE_ENV_VAR,
  BACKTRACE_LIMIT_ENV_VAR,
  LIB_BACKTRACE_ENV_VAR,
  configureBacktrace,
  getBacktraceConfig,
  isBacktraceEnabled,
  parseBacktraceConfig,
} from './config/backtrace-config';
export type { BacktraceConfig } from './config/backtrace-config';

export { ErrboxError } from './errors/errbox-error';
export { InvariantError } from './errors/invariant-error';
export { ConfigError } from './errors/config-error';
export { SerializationError } from './errors/serialization-error';
export { ErrorLogger, currentLogger, useLogger } from './errors/logger';
export type { LogContext, LogSink } from './errors/logger';
export { ErrorHandler } from './errors/handler';
export type { CaptureOptions, Outcome } from './errors/handler';
export type {
  ErrorCategory,
  ErrorCode,
  ErrorContext,
  ErrorSeverity,
  SerializedErrboxError,
} from './errors/types';
