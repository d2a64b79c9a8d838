/**
 * Exclusive async lock for the playback session.
 *
 * Callers queue in FIFO order; each critical section runs only after the
 * previous one settles, whether it resolved or threw.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** True while a critical section is running or queued. */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    this.holders++;
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }
}
