import { inspect } from 'util';
import { Backtrace } from '../backtrace/backtrace';
import { InvariantError } from '../errors/invariant-error';
import { currentLogger } from '../errors/logger';
import {
  ErrorValue,
  Message,
  Reportable,
  debugOf,
  displayOf,
  errorBehavior,
  isErrorValue,
  messageBehavior,
  renderValue,
  typeNameFor,
} from './behavior';
import { ErrorChain } from './chain';
import { formatDebug } from './debug-format';
import { ErasedRecord } from './erased-record';
import { SerializedErrorBox, parseSerializedErrorBox, restoreChain } from './serialization';
import { Concrete, TypeId, typeIdOf } from './type-id';

/**
 * Result of a by-value downcast: the concrete value, or the untouched box.
 */
export type Downcast<T> = { ok: true; value: T } | { ok: false; error: ErrorBox };

const finalizer = new FinalizationRegistry<ErasedRecord>((record) => {
  try {
    record.dispose();
  } catch (error) {
    currentLogger().logWarning('dispose hook failed while finalizing an error box', {
      module: 'handle',
      typeName: record.typeId.name,
      reason: displayOf(error),
    });
  }
});

/**
 * A type-erased owning handle to any error value.
 *
 * Every box carries a backtrace, exposes the cause chain of the value it
 * holds, and can hand the original value back through `downcast`. The box
 * holds a single reference; everything else lives in its record.
 *
 * ```ts
 * const box = ErrorBox.of(new Error('disk full', { cause: writeError }));
 * box.display();             // 'disk full'
 * [...box.chain()].length;   // 2
 * box.downcastRef(Error);    // the original Error
 * ```
 */
export class ErrorBox implements Reportable {
  private inner: ErasedRecord | undefined;

  private constructor(record: ErasedRecord) {
    this.inner = record;
    finalizer.register(this, record, this);
  }

  /**
   * Box an error value. A backtrace is captured here unless the value
   * supplies its own through `backtrace()`.
   */
  static of<E extends ErrorValue>(error: E): ErrorBox {
    return new ErrorBox(ErasedRecord.erase(error, typeIdOf(error), errorBehavior, ErrorBox.of));
  }

  /**
   * Box an ad hoc message. The box's type identity is the payload's own type,
   * so `ErrorBox.msg('oops').downcastRef(String)` yields `'oops'`.
   */
  static msg<M extends Message>(message: M): ErrorBox {
    return new ErrorBox(
      ErasedRecord.erase(message, typeIdOf(message), messageBehavior, ErrorBox.msg)
    );
  }

  /**
   * Convert any value into a box. Boxes convert to themselves.
   */
  static from(value: unknown): ErrorBox {
    if (value instanceof ErrorBox) {
      return value;
    }
    if (isErrorValue(value)) {
      return new ErrorBox(ErasedRecord.erase(value, typeIdOf(value), errorBehavior, ErrorBox.from));
    }
    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
        return new ErrorBox(ErasedRecord.erase(value, typeIdOf(value), messageBehavior, ErrorBox.from));
      case 'object':
        if (value !== null) {
          return new ErrorBox(
            ErasedRecord.erase(value, typeIdOf(value), messageBehavior, ErrorBox.from)
          );
        }
        break;
      default:
        break;
    }
    const text = renderValue(value);
    return new ErrorBox(ErasedRecord.erase(text, String, messageBehavior, ErrorBox.from));
  }

  /**
   * Rebuild a box from `toJSON()` output produced in another execution
   * context. The chain comes back as `RemoteError` values.
   */
  static fromJSON(data: unknown): ErrorBox {
    const root = restoreChain(parseSerializedErrorBox(data));
    return new ErrorBox(ErasedRecord.erase(root, typeIdOf(root), errorBehavior, ErrorBox.fromJSON));
  }

  static isErrorBox(value: unknown): value is ErrorBox {
    return value instanceof ErrorBox;
  }

  /** Whether the box was disposed or downcast by value. */
  get consumed(): boolean {
    return this.inner === undefined;
  }

  display(): string {
    return this.record().display();
  }

  toString(): string {
    return this.display();
  }

  debug(): string {
    const record = this.record();
    const displays = Array.from(this.chain(), (value, index) =>
      index === 0 ? record.display() : displayOf(value)
    );
    return formatDebug(displays, record.backtrace());
  }

  [inspect.custom](): string {
    return this.debug();
  }

  backtrace(): Backtrace {
    return this.record().backtrace();
  }

  /**
   * A fresh walk over the cause chain, starting at the boxed value.
   */
  chain(): ErrorChain {
    return new ErrorChain(this.record(), () => this.inner !== undefined);
  }

  /** The direct cause of the boxed value. */
  source(): unknown {
    return this.record().source();
  }

  rootCause(): unknown {
    let last: unknown;
    for (const link of this.chain()) {
      last = link;
    }
    return last;
  }

  is(type: TypeId): boolean {
    return this.record().typeId === type;
  }

  downcastRef<C extends TypeId>(type: C): Readonly<Concrete<C>> | undefined {
    const record = this.record();
    return record.holds(type) ? record.value : undefined;
  }

  downcastMut<C extends TypeId>(type: C): Concrete<C> | undefined {
    const record = this.record();
    return record.holds(type) ? record.value : undefined;
  }

  /**
   * Take the concrete value out of the box. On success the box is consumed
   * and the value's dispose hook does not run; on mismatch the same box is
   * returned unchanged.
   */
  downcast<C extends TypeId>(type: C): Downcast<Concrete<C>> {
    const record = this.record();
    if (!record.holds(type)) {
      return { ok: false, error: this };
    }
    this.release();
    return { ok: true, value: record.value };
  }

  /**
   * Consume the box, running the value's dispose hook once.
   */
  dispose(): void {
    const record = this.record();
    this.release();
    record.dispose();
  }

  /**
   * Plain, structured-clone-safe snapshot of the box for transfer to
   * another execution context.
   */
  toJSON(): SerializedErrorBox {
    const record = this.record();
    const chain = Array.from(this.chain(), (value, index) => ({
      name: typeNameFor(value),
      display: index === 0 ? record.display() : displayOf(value),
      debug: index === 0 ? record.debug() : debugOf(value),
    }));
    return {
      chain,
      backtrace: record.backtrace().toJSON(),
    };
  }

  private record(): ErasedRecord {
    if (!this.inner) {
      throw new InvariantError('error box used after it was consumed', {
        code: 'INVARIANT_CONSUMED',
        context: { module: 'handle' },
      });
    }
    return this.inner;
  }

  private release(): void {
    this.inner = undefined;
    finalizer.unregister(this);
  }
}
