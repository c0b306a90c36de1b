type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
};

type PendingPush<T> = {
  item: T;
  resolve: (accepted: boolean) => void;
};

export type EventQueueSnapshot = {
  buffered: number;
  blockedProducers: number;
  capacity: number;
  closed: boolean;
};

/**
 * Bounded single-consumer queue.
 *
 * `push()` resolves once the item is buffered; while the buffer is full it
 * waits for the consumer (backpressure, nothing is dropped). After `close()`
 * further pushes resolve `false`, buffered items are still delivered and
 * iteration then ends.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly blockedPushes: Array<PendingPush<T>> = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private readonly capacity: number;
  private closed = false;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  push(item: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.blockedPushes.push({ item, resolve });
    });
  }

  /** Next item, or `undefined` once closed and drained. */
  async shift(): Promise<T | undefined> {
    const result = await this.next();
    return result.done ? undefined : result.value;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    // Blocked producers are released unaccepted.
    for (const pending of this.blockedPushes.splice(0)) {
      pending.resolve(false);
    }
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.buffer.length;
  }

  snapshot(): EventQueueSnapshot {
    return {
      buffered: this.buffer.length,
      blockedProducers: this.blockedPushes.length,
      capacity: this.capacity,
      closed: this.closed,
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => ({ value: undefined, done: true }),
    };
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitBlockedPush();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve) => {
      this.waiters.push({ resolve });
    });
  }

  private admitBlockedPush(): void {
    const pending = this.blockedPushes.shift();
    if (!pending) return;
    this.buffer.push(pending.item);
    pending.resolve(true);
  }
}
