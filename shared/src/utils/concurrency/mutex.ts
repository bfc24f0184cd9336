/**
 * Async mutual exclusion.
 *
 * JavaScript runs one callback at a time, but a read-check-write sequence that
 * spans an `await` can interleave with other callers. `Mutex` queues critical
 * sections in FIFO order; `KeyedMutex` keeps one independent queue per key so
 * unrelated keys never wait on each other.
 */

export type Release = () => void;

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private held = false;

  /**
   * Wait for the lock. The returned function releases it; calling it more
   * than once has no further effect.
   */
  acquire(): Promise<Release> {
    const previous = this.tail;
    let unlock: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    this.tail = previous.then(() => current);
    this.waiting++;

    return previous.then(() => {
      this.waiting--;
      this.held = true;
      let released = false;
      return () => {
        if (released) return;
        released = true;
        this.held = false;
        unlock();
      };
    });
  }

  /**
   * Run `fn` while holding the lock.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.held;
  }

  /** Callers queued behind the current holder */
  getPendingCount(): number {
    return this.waiting;
  }
}

export class KeyedMutex<K extends string> {
  private readonly locks = new Map<K, Mutex>();

  private lockFor(key: K): Mutex {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    return lock;
  }

  runExclusive<T>(key: K, fn: () => T | Promise<T>): Promise<T> {
    return this.lockFor(key).runExclusive(fn);
  }

  /**
   * Run `fn` while holding every listed lock. Locks are taken in sorted key
   * order so two multi-key callers cannot deadlock each other.
   */
  async runExclusiveAll<T>(keys: readonly K[], fn: () => T | Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Release[] = [];
    try {
      for (const key of ordered) {
        releases.push(await this.lockFor(key).acquire());
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  isLocked(key: K): boolean {
    return this.locks.get(key)?.isLocked() ?? false;
  }
}
