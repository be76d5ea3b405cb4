import { RateLimitExceededError } from "../errors.js";
import type { Clock } from "../utils/clock.js";
import { type ConsumeResult, TokenBucket } from "./tokenBucket.js";

export type EndpointLimit = {
  limit: number;
  window: number; // seconds
};

type BucketEntry = {
  clientId: string;
  endpoint: string;
  bucket: TokenBucket;
};

export type RateLimiterOptions = {
  defaultLimit?: number;
  window?: number;
  enabled?: boolean;
  clock?: Clock;
};

export type RateLimiterStats = {
  enabled: boolean;
  defaultLimit: number;
  window: number;
  endpointLimits: Record<string, EndpointLimit>;
  activeBuckets: number;
  clients: number;
};

/**
 * Per-(client, endpoint) token buckets.
 *
 * A bucket is sized from the endpoint limit in force when it is first
 * touched. Changing an endpoint limit later does not resize buckets that
 * already exist; `resetClient` or `cleanupStaleBuckets` drop them so the
 * next request picks up the new limit.
 */
export class RateLimiter {
  readonly defaultLimit: number;
  readonly window: number;
  readonly enabled: boolean;

  private endpointLimits = new Map<string, EndpointLimit>();
  private buckets = new Map<string, BucketEntry>();
  private clock: Clock;

  constructor(options: RateLimiterOptions = {}) {
    this.defaultLimit = options.defaultLimit ?? 100;
    this.window = options.window ?? 60;
    this.enabled = options.enabled ?? true;
    this.clock = options.clock ?? Date.now;
  }

  private static key(clientId: string, endpoint: string) {
    return `${clientId}\u0000${endpoint}`;
  }

  setEndpointLimit(endpoint: string, limit: number, window?: number): void {
    this.endpointLimits.set(endpoint, { limit, window: window ?? this.window });
  }

  getLimit(endpoint: string): EndpointLimit {
    return (
      this.endpointLimits.get(endpoint) ?? {
        limit: this.defaultLimit,
        window: this.window,
      }
    );
  }

  private getBucket(clientId: string, endpoint: string): TokenBucket {
    const key = RateLimiter.key(clientId, endpoint);
    const existing = this.buckets.get(key);
    if (existing) return existing.bucket;

    const { limit, window } = this.getLimit(endpoint);
    const bucket = new TokenBucket(limit, limit / window, this.clock);
    this.buckets.set(key, { clientId, endpoint, bucket });
    return bucket;
  }

  consume(clientId: string, endpoint = "default", cost = 1): ConsumeResult {
    return this.getBucket(clientId, endpoint).consume(cost);
  }

  /**
   * Throws `RateLimitExceededError` when the request would exceed the limit.
   * No-op while the limiter is disabled.
   */
  checkLimit(clientId: string, endpoint = "default", cost = 1): void {
    if (!this.enabled) return;

    const { allowed, retryAfter } = this.consume(clientId, endpoint, cost);
    if (!allowed) {
      const { limit, window } = this.getLimit(endpoint);
      throw new RateLimitExceededError(limit, window, retryAfter);
    }
  }

  resetClient(clientId: string, endpoint?: string): void {
    if (endpoint !== undefined) {
      this.buckets.delete(RateLimiter.key(clientId, endpoint));
      return;
    }

    for (const [key, entry] of this.buckets) {
      if (entry.clientId === clientId) this.buckets.delete(key);
    }
  }

  /**
   * Drops buckets untouched for more than `maxAge` seconds.
   * Returns how many were removed.
   */
  cleanupStaleBuckets(maxAge = 3600): number {
    const now = this.clock();
    let removed = 0;

    for (const [key, entry] of this.buckets) {
      if (now - entry.bucket.lastRefill > maxAge * 1000) {
        this.buckets.delete(key);
        removed++;
      }
    }

    return removed;
  }

  getStats(): RateLimiterStats {
    const clients = new Set<string>();
    for (const entry of this.buckets.values()) clients.add(entry.clientId);

    return {
      enabled: this.enabled,
      defaultLimit: this.defaultLimit,
      window: this.window,
      endpointLimits: Object.fromEntries(this.endpointLimits),
      activeBuckets: this.buckets.size,
      clients: clients.size,
    };
  }
}
