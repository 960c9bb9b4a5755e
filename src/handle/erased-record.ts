import { Backtrace } from '../backtrace/backtrace';
import { InvariantError } from '../errors/invariant-error';
import { Behavior } from './behavior';
import { Concrete, TypeId } from './type-id';

/**
 * The heap record behind an ErrorBox. `behavior` and `value` always describe
 * the same concrete type; both are fixed at construction.
 */
export class ErasedRecord<E = unknown> {
  private constructor(
    readonly typeId: TypeId,
    readonly behavior: Behavior<E>,
    readonly captured: Backtrace | undefined,
    readonly value: E
  ) {}

  /**
   * Erase `value`, capturing a backtrace unless the value supplies its own.
   */
  static erase<E>(
    value: E,
    typeId: TypeId,
    behavior: Behavior<E>,
    captureFrom: Function
  ): ErasedRecord<E> {
    const captured =
      behavior.backtrace(value) === undefined ? Backtrace.capture(captureFrom) : undefined;
    return new ErasedRecord(typeId, behavior, captured, value);
  }

  holds<C extends TypeId>(type: C): this is ErasedRecord<Concrete<C>> {
    return this.typeId === type;
  }

  display(): string {
    return this.behavior.display(this.value);
  }

  debug(): string {
    return this.behavior.debug(this.value);
  }

  source(): unknown {
    return this.behavior.source(this.value);
  }

  backtrace(): Backtrace {
    const backtrace = this.captured ?? this.behavior.backtrace(this.value);
    if (!backtrace) {
      throw new InvariantError('error box has no backtrace', {
        code: 'INVARIANT_BACKTRACE_MISSING',
        context: { module: 'handle', typeName: this.typeId.name },
      });
    }
    return backtrace;
  }

  dispose(): void {
    this.behavior.dispose(this.value);
  }
}
