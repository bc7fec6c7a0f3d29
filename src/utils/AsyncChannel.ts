interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * Unbounded push-based async queue. Producers call push/close/fail, a single
 * consumer iterates with for-await.
 */
export class AsyncChannel<T> implements AsyncIterableIterator<T> {
  private queue: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;
  private closeListeners: Array<() => void> = [];

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run listener once the channel closes, from either side. Runs right away
   * on a closed channel.
   */
  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  /**
   * Enqueue a value. Returns false once the channel is closed.
   */
  push(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else {
      this.queue.push(value);
    }
    return true;
  }

  /**
   * Stop accepting values; queued values are still delivered
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
    this.notifyClosed();
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = { error };

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
    this.notifyClosed();
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      const value = this.queue[0];
      this.queue.shift();
      return Promise.resolve({ value, done: false });
    }

    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Consumer-side close: discards anything still queued
   */
  return(): Promise<IteratorResult<T, undefined>> {
    this.queue = [];
    this.failure = null;
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  private notifyClosed(): void {
    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
