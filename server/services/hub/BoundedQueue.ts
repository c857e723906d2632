/**
 * Single-consumer FIFO with a fixed capacity. Producers never wait: `offer`
 * reports a full or closed queue by returning false.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  offer(item: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      return false;
    }

    this.items.push(item);
    return true;
  }

  /** Resolves with the next item, or null once the queue is closed. */
  take(): Promise<T | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }

    if (this.waiter) {
      return Promise.reject(new Error("BoundedQueue supports a single consumer"));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Drops anything still queued and wakes a pending `take` with null. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.items.length = 0;

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.items.length;
  }
}
