/**
 * DispatchQueue
 *
 * Unbounded FIFO channel between producers (submit and the control actions)
 * and the single orchestrator consumer. `next()` parks the consumer until an
 * item arrives or the queue is closed.
 */

export class DispatchQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  /**
   * Add an item. Returns false once the queue is closed.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Resolve with the next item in FIFO order, or undefined once the queue is
   * closed and drained.
   */
  next(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stop accepting items. Items already queued are still delivered.
   */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.items.length;
  }
}
