export type HandoffQueueOptions<T> = {
  capacity: number;
  consume: (item: T) => void | Promise<void>;
  onDrop?: (item: T) => void;
  onDepthChange?: (depth: number) => void;
  onError: (error: unknown, item: T) => void;
};

/**
 * Bounded single-consumer queue. `push` never blocks: when the queue is full
 * the oldest waiting item is evicted. Items are consumed one at a time in
 * push order.
 */
export class HandoffQueue<T> {
  private readonly capacity: number;
  private readonly consume: (item: T) => void | Promise<void>;
  private readonly onDrop?: (item: T) => void;
  private readonly onDepthChange?: (depth: number) => void;
  private readonly onError: (error: unknown, item: T) => void;
  private items: T[] = [];
  private head = 0;
  private draining: Promise<void> | null = null;
  private closed = false;
  private dropped = 0;
  private consumed = 0;

  constructor(options: HandoffQueueOptions<T>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.consume = options.consume;
    this.onDrop = options.onDrop;
    this.onDepthChange = options.onDepthChange;
    this.onError = options.onError;
  }

  get depth(): number {
    return this.items.length - this.head;
  }

  get stats() {
    return { depth: this.depth, dropped: this.dropped, consumed: this.consumed, capacity: this.capacity };
  }

  /** Returns false when the queue has been closed. */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.depth >= this.capacity) {
      const evicted = this.shift();
      if (evicted.present) {
        this.dropped += 1;
        this.onDrop?.(evicted.item);
      }
    }
    this.items.push(item);
    this.onDepthChange?.(this.depth);
    this.scheduleDrain();
    return true;
  }

  /** Resolves once every item pushed so far has been consumed. */
  async drained(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drained();
  }

  private shift(): { present: true; item: T } | { present: false } {
    if (this.head >= this.items.length) {
      return { present: false };
    }
    const item = this.items[this.head];
    this.head += 1;
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item === undefined ? { present: false } : { present: true, item };
  }

  private scheduleDrain() {
    if (this.draining) {
      return;
    }
    this.draining = new Promise<void>(resolve => {
      setImmediate(resolve);
    })
      .then(() => this.drain())
      .finally(() => {
        this.draining = null;
        if (this.depth > 0) {
          this.scheduleDrain();
        }
      });
  }

  private async drain() {
    for (;;) {
      const next = this.shift();
      if (!next.present) {
        break;
      }
      this.onDepthChange?.(this.depth);
      try {
        await this.consume(next.item);
      } catch (error) {
        this.onError(error, next.item);
      }
      this.consumed += 1;
    }
    if (this.head > 0) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
