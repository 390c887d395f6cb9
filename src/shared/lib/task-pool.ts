// src/shared/lib/task-pool.ts

/**
 * Runs at most `size` tasks at a time; the rest wait in FIFO order.
 * A pool of size 1 doubles as an async mutex.
 */
export class TaskPool {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`TaskPool size must be a positive integer, got ${size}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  async run<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    // the slot passes straight to the next waiter
    if (next) next();
    else this.active -= 1;
  }
}

/** `Promise.all` over `items` with at most `limit` calls in flight; output keeps input order. */
export function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const pool = new TaskPool(Math.max(1, Math.floor(limit)));
  return Promise.all(items.map((item, index) => pool.run(() => fn(item, index))));
}
