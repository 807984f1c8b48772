/**
 * Per-key async mutual exclusion.
 *
 * Work for the same key runs strictly one after another in submission order;
 * work for different keys never waits on each other. Entries are dropped once
 * a key's queue drains, so the map only holds keys with work in flight.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();
  private depth = new Map<string, number>();

  /** Run `task` once every earlier task for `key` has settled. */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.depth.set(key, (this.depth.get(key) ?? 0) + 1);

    await previous;
    try {
      return await task();
    } finally {
      release();
      const remaining = (this.depth.get(key) ?? 1) - 1;
      if (remaining === 0) {
        this.depth.delete(key);
        if (this.tails.get(key) === tail) this.tails.delete(key);
      } else {
        this.depth.set(key, remaining);
      }
    }
  }

  /** True while a task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return (this.depth.get(key) ?? 0) > 0;
  }

  /** Number of tasks running or queued for `key`. */
  queued(key: string): number {
    return this.depth.get(key) ?? 0;
  }
}
