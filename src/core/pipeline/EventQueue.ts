interface PendingWriter<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface Boxed<T> {
  value: T;
}

export class QueueClosedError extends Error {
  public constructor() {
    super('Event queue is closed');
    this.name = 'QueueClosedError';
  }
}

// `push` suspends while `capacity` items are buffered.
export class EventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: Boxed<T>[] = [];
  private readonly writers: PendingWriter<T>[] = [];
  private readonly readers: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  public constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Event queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.buffer.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public push(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }

    const reader = this.readers.shift();
    if (reader) {
      reader({ value, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.writers.push({ value, resolve, reject });
    });
  }

  // Buffered items are still delivered; blocked writers are rejected.
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;

    for (const writer of this.writers.splice(0)) {
      writer.reject(new QueueClosedError());
    }

    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
  }

  public next(): Promise<IteratorResult<T>> {
    const head = this.buffer.shift();
    if (head) {
      this.admitWriter();
      return Promise.resolve({ value: head.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.readers.push(resolve);
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next()
    };
  }

  private admitWriter(): void {
    const writer = this.writers.shift();
    if (!writer) {
      return;
    }

    this.buffer.push({ value: writer.value });
    writer.resolve();
  }
}
