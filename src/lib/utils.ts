export class Queue<T> {
  private readonly queue: Record<string, T>;

  private start: bigint;

  private end: bigint;

  constructor() {
    this.queue = {};
    this.start = 0n;
    this.end = 0n;
  }

  get size(): bigint {
    return this.end - this.start;
  }

  isEmpty(): boolean {
    return this.end === this.start;
  }

  toArray(): T[] {
    return [...this];
  }

  dequeue(): T | null {
    if (this.isEmpty()) {
      return null;
    }
    const value: T = this.queue[this.start.toString()];
    delete this.queue[this.start.toString()];
    ++this.start;
    return value;
  }

  enqueue(value: T): void {
    this.queue[this.end.toString()] = value;
    ++this.end;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = this.start; i < this.end; ++i) {
      yield this.queue[i.toString()];
    }
  }
}

/** Keeps the latest `limit` entries, dropping the oldest first. */
export class LimitedQueue<T> extends Queue<T> {
  private readonly limit: bigint;

  constructor(limit: number) {
    super();
    this.limit = BigInt(limit);
  }

  enqueue(value: T): void {
    if (this.size === this.limit) {
      super.dequeue();
    }
    super.enqueue(value);
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function toSeconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}
