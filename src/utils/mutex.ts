/**
 * Promise-chained mutual exclusion. Waiters run in FIFO order; a rejected
 * critical section releases the lock and rethrows to its caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.holders++;
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }

  /**
   * Run `fn` only if nobody holds or waits for the lock. Reports `ran: false` otherwise.
   */
  async tryRunExclusive<T>(fn: () => Promise<T> | T): Promise<{ ran: true; value: T } | { ran: false }> {
    if (this.isLocked()) {
      return { ran: false };
    }
    const value = await this.runExclusive(fn);
    return { ran: true, value };
  }
}
