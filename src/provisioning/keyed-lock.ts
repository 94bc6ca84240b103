/**
 * In-process mutual exclusion.
 *
 * Mutex serializes one critical section; KeyedLock serializes work per key
 * (e.g. per server identity) while unrelated keys proceed concurrently.
 * Waiters are served in arrival order.
 */

/**
 * Single FIFO lock.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `fn` once every earlier holder has released the lock.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /**
   * Whether a holder or waiter exists.
   */
  isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * A lock per key. Entries are dropped once their last holder releases.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` while holding the lock for `key`.
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Run `fn` while holding every lock in `keys`.
   * Keys are de-duplicated and taken in sorted order so two callers can never
   * wait on each other.
   */
  async withLocks<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();

    const acquire = (index: number): Promise<T> => {
      const key = ordered[index];
      if (key === undefined) {
        return fn();
      }
      return this.withLock(key, () => acquire(index + 1));
    };

    return acquire(0);
  }

  /**
   * Whether `key` currently has a holder or waiter.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with a holder or waiter.
   */
  get size(): number {
    return this.tails.size;
  }
}
