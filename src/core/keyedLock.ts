type Release = () => void;

/**
 * In-process async mutex keyed by string. Callers queue in arrival order per key; multi-key
 * acquisitions take keys in sorted order so overlapping key sets cannot deadlock.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(keys: string | readonly string[], task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(typeof keys === "string" ? [keys] : keys);
    try {
      return await task();
    } finally {
      release();
    }
  }

  async acquire(keys: readonly string[]): Promise<Release> {
    const ordered = [...new Set(keys)].sort();
    const releases: Release[] = [];
    for (const key of ordered) {
      releases.push(await this.acquireOne(key));
    }
    return () => {
      for (const release of releases.reverse()) release();
    };
  }

  isLocked(key: string) {
    return this.tails.has(key);
  }

  private async acquireOne(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let unlock: Release = () => undefined;
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);
    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}
