import { InvariantError } from '../errors/invariant-error';
import { sourceOf } from './behavior';
import type { ErasedRecord } from './erased-record';

type Cursor =
  | { kind: 'root'; record: ErasedRecord }
  | { kind: 'link'; value: unknown }
  | { kind: 'done' };

/**
 * Forward-only walk over a cause chain, root first. Cycles are followed
 * indefinitely.
 */
export class ErrorChain implements IterableIterator<unknown> {
  private cursor: Cursor;

  constructor(
    record: ErasedRecord,
    private readonly isLive: () => boolean
  ) {
    this.cursor = { kind: 'root', record };
  }

  next(): IteratorResult<unknown> {
    if (!this.isLive()) {
      throw new InvariantError('error chain outlived its error box', {
        code: 'INVARIANT_CONSUMED',
        context: { module: 'chain' },
      });
    }

    switch (this.cursor.kind) {
      case 'root': {
        const { record } = this.cursor;
        this.advance(record.source());
        return { done: false, value: record.value };
      }
      case 'link': {
        const { value } = this.cursor;
        this.advance(sourceOf(value));
        return { done: false, value };
      }
      case 'done':
        return { done: true, value: undefined };
    }
  }

  [Symbol.iterator](): IterableIterator<unknown> {
    return this;
  }

  private advance(source: unknown): void {
    this.cursor =
      source === undefined || source === null ? { kind: 'done' } : { kind: 'link', value: source };
  }
}
