import {Closable} from '../types';

/**
 * Iterator over an iterable that owns a resource, typically the file the
 * iterable reads from. The resource is closed exactly once: when the
 * iterable is exhausted, on an early `break`, on explicit `close()`, or at
 * the end of `use()`.
 */
export class ClosingIterator<T> implements IterableIterator<T> {
  private readonly iterator: Iterator<T>;
  private isClosed = false;

  constructor(
    iterable: Iterable<T>,
    private readonly resource: Closable
  ) {
    this.iterator = iterable[Symbol.iterator]();
  }

  get closed(): boolean {
    return this.isClosed;
  }

  [Symbol.iterator](): this {
    return this;
  }

  next(): IteratorResult<T> {
    if (this.isClosed) {
      return {done: true, value: undefined};
    }

    let result: IteratorResult<T>;
    try {
      result = this.iterator.next();
    } catch (error) {
      this.close();
      throw error;
    }

    if (result.done) {
      this.close();
      return {done: true, value: undefined};
    }
    return result;
  }

  /**
   * Called by `for...of` when the loop exits early
   */
  return(): IteratorResult<T> {
    this.close();
    return {done: true, value: undefined};
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    try {
      // Lets a generator producer run its finally blocks
      this.iterator.return?.();
    } finally {
      this.resource.close();
    }
  }

  use<R>(fn: (iterator: this) => R): R {
    try {
      return fn(this);
    } finally {
      this.close();
    }
  }
}
