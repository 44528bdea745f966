/**
 * Unbounded queue with any number of producers and a single consumer.
 * Values pushed by concurrent tasks are handed to the consumer in push order.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: IteratorYieldResult<T>[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  push(value: T): void {
    if (this.closed) {
      return;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value, done: false });
      return;
    }

    this.buffer.push({ value, done: false });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve(buffered);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }
}
