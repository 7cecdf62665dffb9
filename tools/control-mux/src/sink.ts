interface PendingPush<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Bounded, ordered, closable queue between the read loop and a consumer.
 *
 * When `capacity` items are buffered, `push()` waits until the consumer takes
 * one, so a slow consumer applies backpressure to the producer instead of
 * losing items. `close()` lets buffered items drain, then every reader sees
 * end-of-sequence. Breaking out of a `for await` does not close the sink; a
 * later iteration continues where the previous one stopped.
 */
export class Sink<T> implements AsyncIterable<T> {
  private readonly capacity: number;
  private readonly buffer: T[] = [];
  private readonly pushers: PendingPush<T>[] = [];
  private readonly readers: Array<(result: IteratorResult<T>) => void> = [];
  private isClosed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Sink capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueue an item. Resolves `true` once it is buffered or handed to a
   * reader, `false` if the sink closed before it could be accepted.
   */
  push(item: T): Promise<boolean> {
    if (this.isClosed) return Promise.resolve(false);

    const reader = this.readers.shift();
    if (reader) {
      reader({ value: item, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pushers.push({ item, resolve });
    });
  }

  /** Take the next item, waiting while the sink is empty and open. */
  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      this.admitPusher();
      return Promise.resolve({ value: item, done: false });
    }

    if (this.isClosed) return Promise.resolve({ value: undefined, done: true });

    return new Promise<IteratorResult<T>>((resolve) => {
      this.readers.push(resolve);
    });
  }

  /** Idempotent. Buffered items remain readable; blocked pushes resolve `false`. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const pusher of this.pushers.splice(0)) {
      pusher.resolve(false);
    }
    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => ({ value: undefined, done: true }),
    };
  }

  private admitPusher(): void {
    const pusher = this.pushers.shift();
    if (!pusher) return;
    this.buffer.push(pusher.item);
    pusher.resolve(true);
  }
}
