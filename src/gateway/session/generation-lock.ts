/**
 * Single-flight lock with a FIFO wait queue.
 * Callers run strictly one at a time in the order they called `run`.
 */
export class GenerationLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private held = false;

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;

    await previous;
    this.held = true;
    try {
      return await fn();
    } finally {
      this.held = false;
      this.pending--;
      release();
    }
  }

  isHeld(): boolean {
    return this.held;
  }

  /** Holder plus waiters */
  get size(): number {
    return this.pending;
  }
}
