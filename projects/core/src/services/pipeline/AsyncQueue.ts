/**
 * AsyncQueue - bridges push-style producers (token streamer callbacks) to a
 * pull-based async iterable with a single consumer.
 */

interface Waiter<T> {
  readonly resolve: (result: IteratorResult<T, undefined>) => void;
  readonly reject: (error: Error) => void;
}

/**
 * An async queue that can be used as an async iterable.
 * Producers push items, the consumer receives them in push order.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ readonly value: T }> = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private error: Error | null = null;
  private readonly onReturn: (() => void) | null;

  /**
   * @param onReturn - called once if the consumer stops iterating early,
   *   so the producer can stop too
   */
  constructor(onReturn?: () => void) {
    this.onReturn = onReturn ?? null;
  }

  /**
   * Push an item. A waiting consumer receives it immediately.
   * Pushes after close are dropped.
   */
  push(item: T): void {
    if (this.closed) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
  }

  /**
   * Signal that no more items will be pushed. Buffered items are still
   * delivered.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /**
   * Close with an error. The consumer receives buffered items first, then the
   * error is thrown from its next pull.
   */
  closeWithError(error: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.error = error;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    let finished = false;
    try {
      while (true) {
        const result = await this.next();
        if (result.done) {
          finished = true;
          return;
        }
        yield result.value;
      }
    } catch (error) {
      finished = true;
      throw error;
    } finally {
      if (!finished) {
        this.closed = true;
        this.onReturn?.();
      }
    }
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const buffered = this.items.shift();
    if (buffered) {
      return Promise.resolve({ value: buffered.value, done: false });
    }

    if (this.error) {
      return Promise.reject(this.error);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
