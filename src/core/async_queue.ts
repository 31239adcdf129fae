type Waiter<T> = {
  resolve: (value: T) => void;
  reject: (err: Error) => void;
};

/**
 * FIFO hand-off between a producer callback and awaiting consumers.
 * After `fail`, buffered items are still delivered, then every `next` rejects.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private failure: Error | null = null;

  push(item: T) {
    if (this.failure) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  async next(): Promise<T> {
    if (this.items.length > 0) {
      return this.items.splice(0, 1)[0];
    }
    if (this.failure) throw this.failure;
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  fail(err: Error) {
    if (this.failure) return;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }

  isFailed(): boolean {
    return this.failure !== null;
  }
}
