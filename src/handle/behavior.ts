import { inspect } from 'util';
import type { Backtrace } from '../backtrace/backtrace';
import { typeNameOf } from './type-id';

/**
 * Optional hooks an error type can implement to control how a box renders,
 * walks and releases it.
 */
export interface ErrorHooks {
  /** Single-line rendering. */
  display?(): string;
  /** Diagnostic rendering. */
  debug?(): string;
  /** The error that caused this one, if any. */
  source?(): unknown;
  /** A backtrace this error already carries. */
  backtrace?(): Backtrace | undefined;
  /** Runs once when the owning box releases the value. */
  dispose?(): void;
}

/**
 * A non-`Error` object that can be boxed.
 */
export interface Reportable extends ErrorHooks {
  display(): string;
}

export type ErrorValue = (Error & ErrorHooks) | Reportable;

/**
 * Anything `ErrorBox.msg` accepts as an ad hoc payload.
 */
export type Message = string | number | boolean | object;

/**
 * Dispatch table bound to one kind of boxed value. Kept alongside the value
 * so the box can render, walk and release it without knowing its type.
 */
export interface Behavior<E> {
  display(value: E): string;
  debug(value: E): string;
  source(value: E): unknown;
  backtrace(value: E): Backtrace | undefined;
  dispose(value: E): void;
}

const OMITTED_FIELDS = new Set(['name', 'message', 'stack', 'cause']);

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export function isErrorValue(value: unknown): value is ErrorValue {
  if (value instanceof Error) {
    return true;
  }
  return isObject(value) && 'display' in value && typeof value.display === 'function';
}

/**
 * `String(value)`, or an inspection when the value cannot be converted to a
 * primitive (null-prototype objects, throwing `toString` overrides).
 */
export function renderValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return inspect(value);
  }
}

function debugError(error: Error): string {
  const head = error.message ? `${error.name}: ${error.message}` : error.name;
  const extras = Object.entries(error).filter(([key]) => !OMITTED_FIELDS.has(key));
  if (extras.length === 0) {
    return head;
  }
  return `${head} ${inspect(Object.fromEntries(extras), { breakLength: Infinity })}`;
}

function disposeIfPossible(value: unknown): void {
  if (isObject(value) && 'dispose' in value && typeof value.dispose === 'function') {
    value.dispose();
  }
}

export const errorBehavior: Behavior<ErrorValue> = {
  display(error) {
    if (typeof error.display === 'function') {
      return error.display();
    }
    return error instanceof Error ? error.message : renderValue(error);
  },
  debug(error) {
    if (typeof error.debug === 'function') {
      return error.debug();
    }
    return error instanceof Error ? debugError(error) : inspect(error);
  },
  source(error) {
    if (typeof error.source === 'function') {
      return error.source() ?? undefined;
    }
    return error instanceof Error ? error.cause ?? undefined : undefined;
  },
  backtrace(error) {
    return typeof error.backtrace === 'function' ? error.backtrace() : undefined;
  },
  dispose(error) {
    if (typeof error.dispose === 'function') {
      error.dispose();
    }
  },
};

export const messageBehavior: Behavior<Message> = {
  display(message) {
    return renderValue(message);
  },
  debug(message) {
    return inspect(message);
  },
  source() {
    return undefined;
  },
  backtrace() {
    return undefined;
  },
  dispose(message) {
    disposeIfPossible(message);
  },
};

/**
 * Display any link of a cause chain.
 */
export function displayOf(value: unknown): string {
  return isErrorValue(value) ? errorBehavior.display(value) : renderValue(value);
}

export function debugOf(value: unknown): string {
  return isErrorValue(value) ? errorBehavior.debug(value) : inspect(value);
}

export function sourceOf(value: unknown): unknown {
  return isErrorValue(value) ? errorBehavior.source(value) : undefined;
}

/**
 * Name recorded for a chain link when it is serialized.
 */
export function typeNameFor(value: unknown): string {
  return value instanceof Error ? value.name : typeNameOf(value);
}
