import { TokenBucket } from '../token-bucket';
import { FakeClock } from '../../__tests__/support/fake-clock';

describe('TokenBucket', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  describe('construction', () => {
    it('should start full with capacity equal to requests per minute', () => {
      const bucket = new TokenBucket(30, clock);

      expect(bucket.getState()).toEqual({
        capacity: 30,
        tokens: 30,
        refillRatePerSecond: 0.5,
        lastRefillTimestamp: clock.now(),
      });
    });

    it('should reject a non-positive rate', () => {
      expect(() => new TokenBucket(0, clock)).toThrow(RangeError);
      expect(() => new TokenBucket(-5, clock)).toThrow(RangeError);
    });
  });

  describe('tryAcquire()', () => {
    it('should allow exactly capacity calls in a burst', () => {
      const bucket = new TokenBucket(3, clock);

      expect(bucket.tryAcquire()).toBe(true);
      expect(bucket.tryAcquire()).toBe(true);
      expect(bucket.tryAcquire()).toBe(true);
      expect(bucket.tryAcquire()).toBe(false);
    });

    it('should refill proportionally to elapsed time', () => {
      const bucket = new TokenBucket(60, clock);
      for (let i = 0; i < 60; i++) {
        bucket.tryAcquire();
      }

      clock.advance(2500);

      expect(bucket.getState().tokens).toBeCloseTo(2.5);
      expect(bucket.tryAcquire(2)).toBe(true);
      expect(bucket.tryAcquire(1)).toBe(false);
    });

    it('should never refill above capacity', () => {
      const bucket = new TokenBucket(10, clock);
      bucket.tryAcquire(4);

      clock.advance(10 * 60 * 1000);

      expect(bucket.getState().tokens).toBe(10);
    });

    it('should ignore a clock that moves backwards', () => {
      const bucket = new TokenBucket(60, clock);
      bucket.tryAcquire(60);

      clock.advance(-5000);

      expect(bucket.getState().tokens).toBe(0);
    });

    it('should reject non-positive token counts', () => {
      const bucket = new TokenBucket(10, clock);

      expect(() => bucket.tryAcquire(0)).toThrow(RangeError);
      expect(() => bucket.tryAcquire(-1)).toThrow(RangeError);
    });
  });

  describe('acquire()', () => {
    it('should resolve immediately when a token is available', async () => {
      const bucket = new TokenBucket(5, clock);

      await expect(bucket.acquire()).resolves.toBe(true);
      expect(clock.sleeps).toEqual([]);
    });

    it('should wait in 100ms steps until a token refills', async () => {
      const bucket = new TokenBucket(60, clock);
      bucket.tryAcquire(60);
      const startedAt = clock.now();

      await expect(bucket.acquire(1, 30000)).resolves.toBe(true);

      const waited = clock.now() - startedAt;
      expect(waited).toBeGreaterThanOrEqual(1000);
      expect(waited).toBeLessThanOrEqual(1100);
      expect(new Set(clock.sleeps)).toEqual(new Set([100]));
    });

    it('should resolve false after the timeout without consuming tokens', async () => {
      const bucket = new TokenBucket(60, clock);
      bucket.tryAcquire(60);
      const startedAt = clock.now();

      await expect(bucket.acquire(1, 500)).resolves.toBe(false);

      expect(clock.now() - startedAt).toBe(500);
      expect(bucket.getState().tokens).toBeCloseTo(0.5);
    });

    it('should resolve false at once for more tokens than capacity', async () => {
      const bucket = new TokenBucket(5, clock);

      await expect(bucket.acquire(6, 30000)).resolves.toBe(false);
      expect(clock.sleeps).toEqual([]);
      expect(bucket.getState().tokens).toBe(5);
    });

    it('should grant a full burst then make the next caller wait', async () => {
      const bucket = new TokenBucket(2, clock);

      const results = await Promise.all([bucket.acquire(), bucket.acquire()]);
      expect(results).toEqual([true, true]);

      await expect(bucket.acquire(1, 10)).resolves.toBe(false);
    });
  });
});
