/**
 * @fileoverview Keyed asynchronous mutex.
 *
 * One FIFO lock per key. Used for single-flight sync ticks (keyed by account)
 * and for row-level exclusion on emails and action items (keyed by id).
 * Not reentrant: acquiring a key you already hold waits forever.
 */

export type Release = () => void;

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Wait for the key and return its release function.
   * Calling release more than once is harmless.
   */
  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /**
   * Acquire several keys in sorted order, so two callers locking
   * overlapping sets cannot deadlock each other.
   */
  async acquireMany(keys: string[]): Promise<Release> {
    const ordered = [...new Set(keys)].sort();
    const releases: Release[] = [];
    for (const key of ordered) {
      releases.push(await this.acquire(key));
    }
    return () => {
      for (const release of releases.reverse()) {
        release();
      }
    };
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async runExclusiveMany<T>(keys: string[], fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireMany(keys);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** True while someone holds or waits for the key. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
