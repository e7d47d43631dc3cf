interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Bounded hand-off between the capture stream and the segmentation loop.
 *
 * The producer side never waits: when the queue is full the incoming item is
 * dropped, so audio that is already buffered stays contiguous. Only the
 * consumer waits, and only up to the timeout it passes to `pop`.
 */
export class FrameQueue<T> {
  private items: T[] = [];
  private head = 0;
  private waiters: Waiter<T>[] = [];
  private _dropped = 0;
  private _closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`FrameQueue capacity must be a positive integer (got ${capacity})`);
    }
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get dropped(): number {
    return this._dropped;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Non-blocking enqueue. Returns false when the item was dropped. */
  tryPush(item: T): boolean {
    if (this._closed) {
      this._dropped++;
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return true;
    }

    if (this.size >= this.capacity) {
      this._dropped++;
      return false;
    }

    this.items.push(item);
    return true;
  }

  /** Take the next item without waiting. */
  poll(): T | undefined {
    if (this.size === 0) return undefined;

    const item = this.items[this.head++];
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  /** Resolves with the next item, or undefined after `timeoutMs` or on close. */
  pop(timeoutMs: number): Promise<T | undefined> {
    const ready = this.poll();
    if (ready !== undefined || this._closed) {
      return Promise.resolve(ready);
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(undefined);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything currently buffered. */
  drain(): T[] {
    const rest = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return rest;
  }

  close(): void {
    this._closed = true;
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
    this.waiters = [];
  }

  /** Reopen for a new session; buffered items and the drop count are cleared. */
  reset(): void {
    this.close();
    this.items = [];
    this.head = 0;
    this._dropped = 0;
    this._closed = false;
  }
}
