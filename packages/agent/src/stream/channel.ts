type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded single-consumer queue. `push` never waits, so the producer is
 * never held up by a slow reader.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private waiter: Waiter<T> | null = null;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  push(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value, done: false });
    } else {
      this.items.push({ value });
    }
    return true;
  }

  close(): void {
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.items.shift();
    if (item) {
      return Promise.resolve({ value: item.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
