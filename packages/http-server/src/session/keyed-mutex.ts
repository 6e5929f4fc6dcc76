/**
 * Promise-based mutexes for serializing work per session identifier
 */

/**
 * Simple Mutex implementation for exclusive execution
 * Ensures proper lock release even on errors
 */
export class Mutex {
  private queue: Array<() => void> = [];
  private locked = false;

  /**
   * Acquire the lock
   * Returns a release function that must be called exactly once
   */
  async acquire(): Promise<() => void> {
    return new Promise<() => void>((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the lock straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * One mutex per key; idle mutexes are dropped so that the map only holds
 * identifiers with work in flight.
 */
export class KeyedMutex<K = string> {
  private mutexes = new Map<K, Mutex>();

  private getMutex(key: K): Mutex {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    return mutex;
  }

  async runExclusive<T>(key: K, fn: () => Promise<T> | T): Promise<T> {
    const mutex = this.getMutex(key);
    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked() && this.mutexes.get(key) === mutex) {
        this.mutexes.delete(key);
      }
    }
  }

  /**
   * Number of keys with a held or queued lock
   */
  get size(): number {
    return this.mutexes.size;
  }

  clear(): void {
    this.mutexes.clear();
  }
}
