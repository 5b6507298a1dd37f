/**
 * Bounded single-consumer queue between a stream producer and one subscriber.
 *
 * Two ways to add an item:
 * - push(): never waits; when full the oldest queued item is evicted
 *   (live video/audio, where the newest frame matters most)
 * - pushOrWait(): waits up to a deadline for free space and reports failure
 *   instead of dropping (control messages)
 *
 * Items always leave in insertion order; evictions leave gaps, never reorder.
 * Pinned items (a stream's codec header) sit ahead of everything else, are
 * never evicted and do not count against the capacity.
 */
export class FrameQueue<T> {
  private readonly capacity: number;
  private items: T[] = [];
  private pinned = 0;
  private takers: Array<(item: T | undefined) => void> = [];
  private spaceWaiters: Array<() => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Items evicted by push() so far
   */
  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Add an item, evicting the oldest when full.
   * Returns how many items were evicted (0 or 1). No-op once closed.
   */
  push(item: T): number {
    if (this.closed) {
      return 0;
    }

    if (this.handOff(item)) {
      return 0;
    }

    let evicted = 0;
    if (this.isFull()) {
      this.items.splice(this.pinned, 1);
      this.droppedCount++;
      evicted = 1;
    }

    this.items.push(item);
    return evicted;
  }

  /**
   * Add an item that push() can never evict. It is queued after earlier pinned
   * items and before every unpinned one.
   */
  pushPinned(item: T): void {
    if (this.closed || this.handOff(item)) {
      return;
    }

    this.items.splice(this.pinned, 0, item);
    this.pinned++;
  }

  /**
   * Add an item, waiting up to timeoutMs for space.
   * Resolves false if the deadline passes or the queue closes first.
   */
  async pushOrWait(item: T, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    while (!this.closed && this.takers.length === 0 && this.isFull()) {
      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this.waitForSpace(remaining))) {
        return false;
      }
    }

    if (this.closed) {
      return false;
    }

    if (!this.handOff(item)) {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Next item in order; resolves undefined once closed and empty
   */
  take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (this.pinned > 0) {
        this.pinned--;
      } else {
        this.wakeOneWriter();
      }
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise(resolve => this.takers.push(resolve));
  }

  /**
   * Stop accepting items. Queued items can still be taken.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;

    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
    for (const waiter of this.spaceWaiters.splice(0)) {
      waiter();
    }
  }

  /**
   * Discard everything queued
   */
  clear(): void {
    this.items = [];
    this.pinned = 0;
    for (const waiter of this.spaceWaiters.splice(0)) {
      waiter();
    }
  }

  private isFull(): boolean {
    return this.items.length - this.pinned >= this.capacity;
  }

  private handOff(item: T): boolean {
    const taker = this.takers.shift();
    if (!taker) {
      return false;
    }

    taker(item);
    return true;
  }

  private wakeOneWriter(): void {
    this.spaceWaiters.shift()?.();
  }

  private waitForSpace(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const waiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.spaceWaiters = this.spaceWaiters.filter(w => w !== waiter);
        resolve(false);
      }, timeoutMs);
      this.spaceWaiters.push(waiter);
    });
  }
}
