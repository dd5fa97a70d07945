// src/streams/asyncQueue.ts
// Single-consumer FIFO that turns push-style callbacks (ws 'message', model frames) into
// an async iterator. Items queued before end() are still delivered, then the iterator
// finishes, or rejects with the error end() was given.

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waiters: Waiter<T>[] = [];
  private ended = false;
  private failure: unknown = undefined;
  private failed = false;

  public push(item: T): boolean {
    if (this.ended) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
    return true;
  }

  public end(error?: unknown): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (error !== undefined) {
      this.failed = true;
      this.failure = error;
    }

    for (const waiter of this.waiters.splice(0)) {
      if (this.failed) {
        waiter.reject(this.failure);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }

  public isEnded(): boolean {
    return this.ended;
  }

  public get length(): number {
    return this.items.length;
  }

  public next(): Promise<IteratorResult<T>> {
    const queued = this.items.shift();
    if (queued) {
      return Promise.resolve({ value: queued.value, done: false });
    }

    if (this.ended) {
      return this.failed ? Promise.reject(this.failure) : Promise.resolve({ value: undefined, done: true });
    }

    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<T>> => {
        this.end();
        return { value: undefined, done: true };
      },
    };
  }
}
