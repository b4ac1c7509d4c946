interface PendingWrite<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

/**
 * FIFO queue with a fixed capacity and async push/pull.
 *
 * `push` waits while the queue is full and resolves false if the queue is
 * closed before the item is accepted. After `close`, readers drain what is
 * left and then see the end of iteration.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly readers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private readonly writers: Array<PendingWrite<T>> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!(capacity > 0)) {
      throw new RangeError(`Queue capacity must be positive, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Accept the item if there is room right now
   */
  tryPush(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const reader = this.readers.shift();
    if (reader) {
      reader({ value: item, done: false });
      return true;
    }
    if (this.items.length < this.capacity) {
      this.items.push({ value: item });
      return true;
    }
    return false;
  }

  push(item: T): Promise<boolean> {
    if (this.tryPush(item)) {
      return Promise.resolve(true);
    }
    if (this.closed) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      this.writers.push({ item, resolve });
    });
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.items.shift();
    if (entry) {
      this.admitWriter();
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.readers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
    for (const writer of this.writers.splice(0)) {
      writer.resolve(false);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }

  private admitWriter(): void {
    const writer = this.writers.shift();
    if (writer) {
      this.items.push({ value: writer.item });
      writer.resolve(true);
    }
  }
}
