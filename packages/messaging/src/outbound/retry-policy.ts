export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
};

export function computeBackoffMs(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  const exp = Math.max(0, attempt);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, exp));
}

/** A gateway `retry_after` can only push the retry later, never earlier. */
export function nextRetryDelayMs(
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  retryAfterMs: number | null = null,
): number {
  const backoff = computeBackoffMs(attempt, policy);
  return retryAfterMs !== null && retryAfterMs > backoff ? retryAfterMs : backoff;
}

export function hasAttemptsLeft(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): boolean {
  return attempt < policy.maxAttempts;
}
