// ─── Keyed Locks ───
// FIFO mutual exclusion per key. A holder runs only after every earlier
// holder of the same key has released it.

type Release = () => void;

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Wait for exclusive ownership of `key`. The returned function must be
   * called exactly once.
   */
  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: Release = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /**
   * Run `fn` while holding every key. Keys are taken one at a time in the
   * order given and released in reverse; callers must pass them in the
   * global lock order or concurrent holders can deadlock.
   */
  async withKeys<T>(keys: readonly string[], fn: () => T | Promise<T>): Promise<T> {
    const releases: Release[] = [];
    try {
      for (const key of new Set(keys)) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
