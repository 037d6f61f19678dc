type Waiter = {
  kind: 'read' | 'write';
  resolve: () => void;
};

/**
 * Many concurrent readers or one writer. Waiting writers block new readers
 * so a steady read load cannot starve a mutation.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.readers -= 1;
      this.dispatch();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.dispatch();
    }
  }

  get state() {
    return { readers: this.readers, writing: this.writing, waiting: this.queue.length };
  }

  private acquire(kind: 'read' | 'write'): Promise<void> {
    if (kind === 'read' && !this.writing && this.queue.length === 0) {
      this.readers += 1;
      return Promise.resolve();
    }
    if (kind === 'write' && !this.writing && this.readers === 0 && this.queue.length === 0) {
      this.writing = true;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.queue.push({ kind, resolve });
    });
  }

  private dispatch() {
    while (this.queue.length > 0 && !this.writing) {
      const next = this.queue[0];
      if (!next) {
        return;
      }
      if (next.kind === 'write') {
        if (this.readers > 0) {
          return;
        }
        this.queue.shift();
        this.writing = true;
        next.resolve();
        return;
      }
      this.queue.shift();
      this.readers += 1;
      next.resolve();
    }
  }
}
