import { Clock, systemClock } from '../common/clock';

export interface TokenBucketState {
  capacity: number;
  tokens: number;
  refillRatePerSecond: number;
  lastRefillTimestamp: number;
}

/**
 * TokenBucket
 *
 * Per-process limiter for model calls. Capacity equals the configured
 * requests-per-minute; tokens refill continuously at capacity / 60 per second.
 *
 * Refill happens lazily on every attempt. A single attempt (refill, compare,
 * decrement) runs synchronously, so concurrent callers on the event loop can
 * never observe a half-applied update.
 */
export class TokenBucket {
  /** Wait between attempts while the bucket is empty */
  static readonly WAIT_QUANTUM_MS = 100;

  readonly capacity: number;
  readonly refillRatePerSecond: number;

  private tokens: number;
  private lastRefillTimestamp: number;

  constructor(
    requestsPerMinute: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isFinite(requestsPerMinute) || requestsPerMinute <= 0) {
      throw new RangeError(
        `requestsPerMinute must be positive, got ${requestsPerMinute}`,
      );
    }

    this.capacity = requestsPerMinute;
    this.refillRatePerSecond = requestsPerMinute / 60;
    this.tokens = requestsPerMinute;
    this.lastRefillTimestamp = clock.now();
  }

  /**
   * Wait until `tokens` are available or `timeoutMs` elapses.
   * Resolves false on timeout without consuming anything.
   */
  async acquire(tokens = 1, timeoutMs = 30000): Promise<boolean> {
    this.assertTokenCount(tokens);

    if (tokens > this.capacity) {
      return false;
    }

    const deadline = this.clock.now() + timeoutMs;

    for (;;) {
      if (this.tryAcquire(tokens)) {
        return true;
      }
      if (this.clock.now() >= deadline) {
        return false;
      }
      await this.clock.sleep(TokenBucket.WAIT_QUANTUM_MS);
    }
  }

  /**
   * Single non-waiting attempt
   */
  tryAcquire(tokens = 1): boolean {
    this.assertTokenCount(tokens);
    this.refill();

    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      return true;
    }
    return false;
  }

  getState(): TokenBucketState {
    this.refill();
    return {
      capacity: this.capacity,
      tokens: this.tokens,
      refillRatePerSecond: this.refillRatePerSecond,
      lastRefillTimestamp: this.lastRefillTimestamp,
    };
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, (now - this.lastRefillTimestamp) / 1000);
    this.tokens = Math.min(
      this.capacity,
      this.tokens + elapsedSeconds * this.refillRatePerSecond,
    );
    this.lastRefillTimestamp = Math.max(this.lastRefillTimestamp, now);
  }

  private assertTokenCount(tokens: number): void {
    if (!Number.isFinite(tokens) || tokens <= 0) {
      throw new RangeError(`token count must be positive, got ${tokens}`);
    }
  }
}
