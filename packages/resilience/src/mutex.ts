/**
 * Promise-chained mutual exclusion for async sections.
 *
 * Waiters are served in arrival order. `acquire()` resolves to a release
 * function; calling it more than once is a no-op.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  acquire(): Promise<() => void> {
    let unlock: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.holders++;

    return previous.then(() => {
      let released = false;
      return () => {
        if (released) return;
        released = true;
        this.holders--;
        unlock();
      };
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * True while someone holds or waits for the lock
   */
  isLocked(): boolean {
    return this.holders > 0;
  }
}
