/**
 * Unbounded single-producer/single-consumer async queue.
 *
 * The producer pushes values and closes the channel exactly once; the
 * consumer drains it with `next()` or `for await`. Values pushed after
 * `close()` are dropped.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) {
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('EventChannel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
