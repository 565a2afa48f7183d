export interface EventChannelOptions {
  /** Undelivered values kept before the oldest is dropped. Defaults to 1 (latest value wins). */
  capacity?: number;
  /** Aborting discards buffered values and ends iteration. */
  signal?: AbortSignal;
}

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

const DONE = { value: undefined, done: true } as const;

/**
 * Push-to-pull adapter for backend event streams.
 *
 * The producer calls `push`, `close` or `fail`; exactly one consumer reads the channel with
 * `for await`. Values pushed while the consumer is busy are buffered up to `capacity`.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly capacity: number;
  private readonly buffer: Array<{ value: T }> = [];
  private waiter: Waiter<T> | null = null;
  private failure: { error: unknown } | null = null;
  private closed = false;
  private consumed = false;
  private dropped = 0;

  constructor(options: EventChannelOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 1);
    const { signal } = options;
    if (signal?.aborted) {
      this.discard();
    } else {
      signal?.addEventListener('abort', () => this.discard(), { once: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  push(value: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value, done: false });
      return true;
    }
    this.buffer.push({ value });
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this.dropped += 1;
    }
    return true;
  }

  /** Ends the stream once buffered values have been read. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.settleWaiter();
  }

  /** Ends the stream with an error, delivered after buffered values. */
  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.failure = { error };
    this.closed = true;
    this.settleWaiter();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consumed) {
      throw new Error('EventChannel supports a single consumer');
    }
    this.consumed = true;
    return {
      next: () => this.pull(),
      return: () => {
        this.discard();
        return Promise.resolve(DONE);
      }
    };
  }

  private pull(): Promise<IteratorResult<T, undefined>> {
    const next = this.buffer.shift();
    if (next) {
      return Promise.resolve({ value: next.value, done: false });
    }
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }
    if (this.closed) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private discard(): void {
    this.buffer.length = 0;
    this.failure = null;
    this.closed = true;
    this.settleWaiter();
  }

  private settleWaiter(): void {
    const waiter = this.waiter;
    if (!waiter) {
      return;
    }
    this.waiter = null;
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      waiter.reject(error);
      return;
    }
    waiter.resolve(DONE);
  }
}
