/**
 * Push/pull bridge from socket callbacks to an async iterable.
 *
 * The socket side calls `push`, `end` or `fail`; the receiver task consumes
 * with `for await`. Items pushed before anyone reads are buffered.
 */

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private done = false;
  private failure: { error: unknown } | null = null;

  push(item: T): void {
    if (this.done) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  end(): void {
    if (this.done) return;
    this.done = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: unknown): void {
    if (this.done) return;
    this.done = true;
    this.failure = { error };

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  get closed(): boolean {
    return this.done;
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve({ value, done: false });
      }
    }

    if (this.failure) {
      return Promise.reject(this.failure.error);
    }

    if (this.done) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
    };
  }
}
