import type { Clock } from "../utils/clock.js";

export type ConsumeResult = {
  allowed: boolean;
  retryAfter: number; // seconds, 0 when allowed
};

/**
 * Token bucket with lazy refill: tokens are credited from elapsed wall-clock
 * time whenever the bucket is touched, so no timer is needed.
 *
 * The refill-and-consume sequence is synchronous. On a single event loop
 * that makes it atomic for concurrent requests on the same key.
 */
export class TokenBucket {
  tokens: number;
  lastRefill: number; // ms

  constructor(
    readonly capacity: number,
    readonly refillRate: number, // tokens per second
    private clock: Clock = Date.now
  ) {
    if (!(capacity > 0)) {
      throw new RangeError(`capacity must be positive, got ${capacity}`);
    }
    if (!(refillRate > 0)) {
      throw new RangeError(`refillRate must be positive, got ${refillRate}`);
    }
    this.tokens = capacity;
    this.lastRefill = clock();
  }

  private refill() {
    const now = this.clock();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;

    this.tokens = Math.min(
      this.capacity,
      this.tokens + elapsedSeconds * this.refillRate
    );
    this.lastRefill = now;
  }

  consume(cost = 1): ConsumeResult {
    this.refill();

    if (this.tokens >= cost) {
      this.tokens -= cost;
      return { allowed: true, retryAfter: 0 };
    }

    return {
      allowed: false,
      retryAfter: (cost - this.tokens) / this.refillRate,
    };
  }
}
