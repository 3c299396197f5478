interface Waiter {
  grant: (acquired: boolean) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore. `tryAcquire` never waits; `acquire` queues callers
 * FIFO until a slot is released or their signal aborts.
 */
export class ConcurrencyLimiter {
  private activeCount = 0;
  private maxConcurrent: number;
  private waiters: Waiter[] = [];

  constructor(maxConcurrent = Infinity) {
    this.maxConcurrent = ConcurrencyLimiter.checkLimit(maxConcurrent);
  }

  /**
   * Take a slot if one is free. Returns false when at capacity.
   */
  tryAcquire(): boolean {
    if (this.activeCount >= this.maxConcurrent) {
      return false;
    }
    this.activeCount++;
    return true;
  }

  /**
   * Take a slot, waiting in line if needed. Resolves false if `signal`
   * aborts before a slot is granted.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    if (this.waiters.length === 0 && this.tryAcquire()) return Promise.resolve(true);

    return new Promise<boolean>(resolve => {
      const waiter: Waiter = { grant: resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          resolve(false);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Release a slot. A queued waiter, if any, takes it over directly.
   */
  release(): void {
    if (this.activeCount === 0) return;
    this.activeCount--;
    this.grantWaiters();
  }

  setLimit(maxConcurrent: number): void {
    this.maxConcurrent = ConcurrencyLimiter.checkLimit(maxConcurrent);
    this.grantWaiters();
  }

  get active(): number {
    return this.activeCount;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get limit(): number {
    return this.maxConcurrent;
  }

  get hasCapacity(): boolean {
    return this.activeCount < this.maxConcurrent;
  }

  private grantWaiters(): void {
    while (this.waiters.length > 0 && this.activeCount < this.maxConcurrent) {
      const next = this.waiters.shift();
      if (!next) break;
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      this.activeCount++;
      next.grant(true);
    }
  }

  private static checkLimit(limit: number): number {
    if (limit !== Infinity && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    return limit;
  }
}
