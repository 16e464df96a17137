/**
 * Bounded slot pool. A task holds one slot from start to finish and gives it
 * back on every exit path; waiters are served in arrival order.
 */
export class WorkerPool {
  private readonly size: number;
  private active = 0;
  private readonly waitQueue: Array<() => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  get capacity(): number {
    return this.size;
  }

  get inUse(): number {
    return this.active;
  }

  get available(): number {
    return this.size - this.active;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      // the releasing task hands its slot over, so `active` is unchanged
      this.waitQueue.push(resolve);
    });
  }

  private release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
      return;
    }
    this.active--;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Runs every task through the pool; results keep submission order. */
  map<I, T>(items: readonly I[], task: (item: I, index: number) => Promise<T>): Promise<T[]> {
    return Promise.all(items.map((item, index) => this.run(() => task(item, index))));
  }
}
