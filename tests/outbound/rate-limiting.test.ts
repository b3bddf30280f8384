import { describe, expect, it } from "vitest";
import { RateLimitCoordinator } from "../../packages/messaging/src/outbound/rate-limit-coordinator.ts";
import {
  computeBackoffMs,
  hasAttemptsLeft,
  nextRetryDelayMs,
} from "../../packages/messaging/src/outbound/retry-policy.ts";
import { TokenBucket } from "../../packages/messaging/src/outbound/token-bucket.ts";

describe("TokenBucket", () => {
  it("returns each token one window after it was spent", () => {
    const bucket = new TokenBucket("test", 2, 1_000);

    expect(bucket.take(0)).toBe(true);
    expect(bucket.take(10)).toBe(true);
    expect(bucket.take(20)).toBe(false);
    expect(bucket.nextAvailableAt(20)).toBe(1_000);
    expect(bucket.available(1_000)).toBe(1);
    expect(bucket.isIdle(1_009)).toBe(false);
    expect(bucket.isIdle(1_010)).toBe(true);
  });

  it("rejects invalid sizing", () => {
    expect(() => new TokenBucket("bad", 0, 1_000)).toThrow("Token bucket 'bad' capacity must be a positive integer.");
    expect(() => new TokenBucket("bad", 1, 0)).toThrow("Token bucket 'bad' window must be greater than zero.");
  });
});

describe("RateLimitCoordinator", () => {
  it("defers a recipient once its per-minute budget is spent", () => {
    const limiter = new RateLimitCoordinator({ perRecipientPerMinute: 2, perRecipientPerDay: 3, globalPerSecond: 10 });

    expect(limiter.tryAcquire("a", 0)).toEqual({ granted: true });
    expect(limiter.tryAcquire("a", 1)).toEqual({ granted: true });
    expect(limiter.tryAcquire("a", 2)).toEqual({
      granted: false,
      limiter: "recipient_per_minute",
      retry_at_ms: 60_000,
    });
    expect(limiter.tryAcquire("b", 2)).toEqual({ granted: true });
  });

  it("reports the daily budget when it is the later constraint", () => {
    const limiter = new RateLimitCoordinator({ perRecipientPerMinute: 2, perRecipientPerDay: 3, globalPerSecond: 10 });
    limiter.tryAcquire("a", 0);
    limiter.tryAcquire("a", 1);
    limiter.tryAcquire("a", 60_000);

    expect(limiter.tryAcquire("a", 120_001)).toEqual({
      granted: false,
      limiter: "recipient_per_day",
      retry_at_ms: 86_400_000,
    });
  });

  it("takes no token from any bucket when one of them refuses", () => {
    const limiter = new RateLimitCoordinator({ perRecipientPerMinute: 1, perRecipientPerDay: 10, globalPerSecond: 1 });

    expect(limiter.tryAcquire("a", 0)).toEqual({ granted: true });
    expect(limiter.tryAcquire("b", 0)).toEqual({ granted: false, limiter: "global_per_second", retry_at_ms: 1_000 });
    // b's minute bucket was left untouched, so b goes through as soon as the global token returns.
    expect(limiter.tryAcquire("b", 1_000)).toEqual({ granted: true });
  });

  it("prunes recipients whose buckets are idle", () => {
    const limiter = new RateLimitCoordinator({ perRecipientPerMinute: 1, perRecipientPerDay: 10, globalPerSecond: 1 });
    limiter.tryAcquire("a", 0);
    limiter.tryAcquire("b", 0);

    expect(limiter.trackedRecipients).toBe(2);
    expect(limiter.prune(0)).toBe(1);
    expect(limiter.trackedRecipients).toBe(1);
  });
});

describe("retry policy", () => {
  it("doubles the delay per attempt up to the cap", () => {
    expect(computeBackoffMs(0)).toBe(1_000);
    expect(computeBackoffMs(1)).toBe(2_000);
    expect(computeBackoffMs(2)).toBe(4_000);
    expect(computeBackoffMs(10)).toBe(60_000);
  });

  it("lets a longer retry-after push the retry later", () => {
    expect(nextRetryDelayMs(1, undefined, 5_000)).toBe(5_000);
    expect(nextRetryDelayMs(1, undefined, 500)).toBe(2_000);
  });

  it("allows three attempts by default", () => {
    expect(hasAttemptsLeft(2)).toBe(true);
    expect(hasAttemptsLeft(3)).toBe(false);
  });
});
