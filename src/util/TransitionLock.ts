export type Release = () => void;

/**
 * FIFO mutual exclusion for async sections.
 * Each `acquire` resolves once every earlier holder has released.
 */
export class TransitionLock {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  public async acquire(): Promise<Release> {
    let release: Release = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.held++;
    await previous;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.held--;
      release();
    };
  }

  public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  /** Holders plus waiters. */
  public get pending(): number {
    return this.held;
  }
}
