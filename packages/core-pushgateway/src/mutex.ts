/**
 * Mutual exclusion for async work. Waiters are released in FIFO order.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex();
 * await mutex.runExclusive(() => fetch(url, { method: 'PUT', body }));
 * ```
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Run `fn` once every earlier caller has finished. The lock is released even if `fn` throws.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; the lock never reads as free in between
      next();
      return;
    }
    this.locked = false;
  }
}
