// Mutex: FIFO async lock built on a promise chain

/**
 * Callers are admitted strictly in arrival order. There is no timeout and
 * no cancellation; a rejected task releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of tasks holding or waiting for the lock. */
  get queueLength(): number {
    return this.pending;
  }

  get locked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    // The executor runs synchronously, so release is bound before it is needed
    const next = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.pending++;

    await previous;
    try {
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}
