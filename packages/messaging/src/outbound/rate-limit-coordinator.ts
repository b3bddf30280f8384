import { TokenBucket } from "./token-bucket.ts";

const MINUTE_MS = 60_000;
const DAY_MS = 86_400_000;
const SECOND_MS = 1_000;

export type RateLimitConfig = {
  perRecipientPerMinute: number;
  perRecipientPerDay: number;
  globalPerSecond: number;
};

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  perRecipientPerMinute: 30,
  perRecipientPerDay: 1000,
  globalPerSecond: 4,
};

export type RateLimitDecision =
  | { granted: true }
  | { granted: false; limiter: string; retry_at_ms: number };

type RecipientBuckets = {
  minute: TokenBucket;
  day: TokenBucket;
};

/**
 * Owns every token bucket the pipeline spends from. `tryAcquire` checks and takes in one
 * synchronous step: either all buckets give a token or none does.
 */
export class RateLimitCoordinator {
  private readonly global: TokenBucket;
  private readonly recipients = new Map<string, RecipientBuckets>();

  constructor(private readonly config: RateLimitConfig = DEFAULT_RATE_LIMIT_CONFIG) {
    this.global = new TokenBucket("global_per_second", config.globalPerSecond, SECOND_MS);
  }

  tryAcquire(recipient: string, nowMs: number): RateLimitDecision {
    const buckets = this.bucketsFor(recipient);
    const ordered = [buckets.minute, buckets.day, this.global];

    let blocking: TokenBucket | null = null;
    let retryAtMs = nowMs;
    for (const bucket of ordered) {
      const availableAt = bucket.nextAvailableAt(nowMs);
      if (availableAt > retryAtMs) {
        retryAtMs = availableAt;
        blocking = bucket;
      }
    }

    if (blocking) {
      return { granted: false, limiter: blocking.name, retry_at_ms: retryAtMs };
    }
    for (const bucket of ordered) {
      bucket.take(nowMs);
    }
    return { granted: true };
  }

  /** Drops per-recipient buckets whose tokens have all returned. */
  prune(nowMs: number): number {
    let removed = 0;
    for (const [recipient, buckets] of this.recipients) {
      if (buckets.minute.isIdle(nowMs) && buckets.day.isIdle(nowMs)) {
        this.recipients.delete(recipient);
        removed += 1;
      }
    }
    return removed;
  }

  get trackedRecipients(): number {
    return this.recipients.size;
  }

  private bucketsFor(recipient: string): RecipientBuckets {
    const existing = this.recipients.get(recipient);
    if (existing) {
      return existing;
    }
    const created = {
      minute: new TokenBucket("recipient_per_minute", this.config.perRecipientPerMinute, MINUTE_MS),
      day: new TokenBucket("recipient_per_day", this.config.perRecipientPerDay, DAY_MS),
    };
    this.recipients.set(recipient, created);
    return created;
  }
}
