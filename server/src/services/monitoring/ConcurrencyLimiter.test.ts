import { ConcurrencyLimiter } from './ConcurrencyLimiter';

describe('ConcurrencyLimiter', () => {
  it('should allow acquisitions under the limit', () => {
    const limiter = new ConcurrencyLimiter(2);

    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(false);
    expect(limiter.active).toBe(2);
  });

  it('should allow acquisition after release', () => {
    const limiter = new ConcurrencyLimiter(1);
    limiter.tryAcquire();

    limiter.release();

    expect(limiter.tryAcquire()).toBe(true);
  });

  it('should ignore a release with nothing held', () => {
    const limiter = new ConcurrencyLimiter(1);
    limiter.release();

    expect(limiter.active).toBe(0);
  });

  it('should be unbounded by default', () => {
    const limiter = new ConcurrencyLimiter();
    for (let i = 0; i < 100; i++) {
      expect(limiter.tryAcquire()).toBe(true);
    }
    expect(limiter.limit).toBe(Infinity);
  });

  it('should hand released slots to waiters in order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    limiter.tryAcquire();
    const order: string[] = [];

    const first = limiter.acquire().then(ok => order.push(`first:${ok}`));
    const second = limiter.acquire().then(ok => order.push(`second:${ok}`));
    expect(limiter.waiting).toBe(2);

    limiter.release();
    await first;
    expect(limiter.active).toBe(1);

    limiter.release();
    await second;

    expect(order).toEqual(['first:true', 'second:true']);
  });

  it('should drop a waiter whose signal aborts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    limiter.tryAcquire();
    const controller = new AbortController();

    const pending = limiter.acquire(controller.signal);
    controller.abort();

    await expect(pending).resolves.toBe(false);
    expect(limiter.waiting).toBe(0);
  });

  it('should grant waiters when the limit is raised', async () => {
    const limiter = new ConcurrencyLimiter(1);
    limiter.tryAcquire();
    const pending = limiter.acquire();

    limiter.setLimit(2);

    await expect(pending).resolves.toBe(true);
    expect(limiter.active).toBe(2);
  });

  it('should keep active slots when the limit is lowered', () => {
    const limiter = new ConcurrencyLimiter(3);
    limiter.tryAcquire();
    limiter.tryAcquire();

    limiter.setLimit(1);

    expect(limiter.active).toBe(2);
    expect(limiter.hasCapacity).toBe(false);
  });

  it('should reject invalid limits', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1).setLimit(2.5)).toThrow(RangeError);
  });
});
