/**
 * Counting semaphore for limiting concurrent async work.
 * A released permit is handed straight to the oldest waiter, so the number
 * of holders never exceeds the initial permit count.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  /**
   * Run `fn` once a permit is available, releasing it when `fn` settles
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Permits currently free */
  get available(): number {
    return this.permits;
  }

  /** Callers waiting for a permit */
  get pending(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }
}
