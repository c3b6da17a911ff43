interface Slot<T> {
  readonly value: T;
}

interface PendingPush<T> extends Slot<T> {
  readonly resolve: (accepted: boolean) => void;
}

type Taker<T> = (result: IteratorResult<T, undefined>) => void;

const DONE = { done: true, value: undefined } as const;

/**
 * Fixed-capacity async FIFO shared between pipeline stages.
 *
 * `push()` suspends while the queue is full, `shift()` suspends while it is
 * empty. Closing rejects pending and future pushes (they resolve `false`) but
 * leaves buffered items for consumers to drain.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly items: Slot<T>[] = [];
  private readonly pushers: PendingPush<T>[] = [];
  private readonly takers: Taker<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${String(capacity)}`);
    }
  }

  /** Number of buffered items. Suspended pushes are not counted. */
  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Enqueue an item. Resolves `false` without enqueuing if the queue is or becomes closed. */
  push(value: T): Promise<boolean> {
    if (this.isClosed) return Promise.resolve(false);

    const taker = this.takers.shift();
    if (taker) {
      taker({ done: false, value });
      return Promise.resolve(true);
    }

    if (this.items.length < this.capacity) {
      this.items.push({ value });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pushers.push({ value, resolve });
    });
  }

  /** Dequeue the oldest item, or `done` once the queue is closed and drained. */
  shift(): Promise<IteratorResult<T, undefined>> {
    const head = this.items.shift();
    if (head) {
      const pusher = this.pushers.shift();
      if (pusher) {
        this.items.push({ value: pusher.value });
        pusher.resolve(true);
      }
      return Promise.resolve({ done: false, value: head.value });
    }

    if (this.isClosed) return Promise.resolve(DONE);

    return new Promise<IteratorResult<T, undefined>>((resolve) => {
      this.takers.push(resolve);
    });
  }

  /** Close the queue. Idempotent. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const pusher of this.pushers.splice(0)) {
      pusher.resolve(false);
    }
    for (const taker of this.takers.splice(0)) {
      taker(DONE);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.shift();
      if (result.done) return;
      yield result.value;
    }
  }
}
