/**
 * Counting semaphore with FIFO waiters.
 *
 * With a single permit it is the sink lock: one append at a time, in the
 * order the appends were requested.
 */

export class Semaphore {
  private permits: number;
  private waiters: (() => void)[] = [];

  constructor(max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore max must be an integer >= 1, got ${max}`);
    }
    this.permits = max;
  }

  /** Permits free right now */
  get available(): number {
    return this.permits;
  }

  /** Callers waiting for a permit */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Run `fn` while holding a permit. The permit is released when `fn`
   * settles, whether it resolves or throws.
   */
  async use<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }
}
