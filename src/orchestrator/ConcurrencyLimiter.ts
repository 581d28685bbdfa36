/**
 * ConcurrencyLimiter
 *
 * FIFO counting semaphore. At most `maxConcurrent` holders at once; waiters
 * are admitted in the order they asked.
 */

export interface LimiterStats {
  maxConcurrent: number;
  active: number;
  waiting: number;
}

export class ConcurrencyLimiter {
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /**
   * Wait for a free slot.
   */
  acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Hand the slot to the next waiter, or free it.
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.active > 0) {
      this.active--;
    }
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): LimiterStats {
    return {
      maxConcurrent: this.maxConcurrent,
      active: this.active,
      waiting: this.waiters.length,
    };
  }
}
