/**
 * FIFO queue with an awaitable `next`. Unbounded by default; with a
 * capacity the oldest unread item is dropped on overflow.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
      this.droppedCount++;
    }
    return true;
  }

  tryNext(): T | undefined {
    return this.items.shift();
  }

  /**
   * Resolve with the next item, or undefined once `waitMs` elapses, the
   * signal aborts or the queue closes.
   */
  next(waitMs: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>(resolve => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (item: T | undefined): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(finish);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(item);
      };
      const onAbort = (): void => finish(undefined);

      this.waiters.push(finish);
      signal?.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => finish(undefined), waitMs);
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}
