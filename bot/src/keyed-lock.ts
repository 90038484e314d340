/**
 * Per-key mutual exclusion for async work.
 *
 * Calls sharing a key run one at a time in arrival order; calls with
 * different keys don't wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last holder for this key cleans up
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** True while some call holds or waits on `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys currently held or waited on. */
  get size(): number {
    return this.tails.size;
  }
}
