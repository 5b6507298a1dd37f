/**
 * FIFO lock for a session's or a device's state changes.
 * Callers hold it across awaits; whoever queued first runs next.
 */
export class AsyncMutex {
  private held = false;
  private waiters: Array<() => void> = [];

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.lock();
    try {
      return await fn();
    } finally {
      this.unlock();
    }
  }

  isLocked(): boolean {
    return this.held;
  }

  private lock(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => this.waiters.push(resolve));
  }

  // ownership passes straight to the next waiter; held stays true
  private unlock(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.held = false;
  }
}

/**
 * One mutex per key (device serial, session id)
 * Operations on different keys run in parallel; a mutex is dropped once
 * nobody holds or waits for it
 */
export class KeyedMutex {
  private mutexes: Map<string, { mutex: AsyncMutex; users: number }> = new Map();

  async withKeyLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.mutexes.get(key);
    if (!entry) {
      entry = { mutex: new AsyncMutex(), users: 0 };
      this.mutexes.set(key, entry);
    }

    entry.users++;
    try {
      return await entry.mutex.withLock(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        this.mutexes.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.mutex.isLocked() ?? false;
  }

  /**
   * Number of keys currently locked or waited on
   */
  get size(): number {
    return this.mutexes.size;
  }
}
