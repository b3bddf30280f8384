/**
 * Rolling-window bucket: a token spent at `t` comes back at `t + windowMs`, so any window of
 * that length holds at most `capacity` takes.
 */
export class TokenBucket {
  private readonly spentAtMs: number[] = [];

  constructor(
    readonly name: string,
    readonly capacity: number,
    readonly windowMs: number,
  ) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error(`Token bucket '${name}' capacity must be a positive integer.`);
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new Error(`Token bucket '${name}' window must be greater than zero.`);
    }
  }

  available(nowMs: number): number {
    this.refill(nowMs);
    return this.capacity - this.spentAtMs.length;
  }

  /** `nowMs` when a token is free, otherwise the moment the oldest one returns. */
  nextAvailableAt(nowMs: number): number {
    this.refill(nowMs);
    if (this.spentAtMs.length < this.capacity) {
      return nowMs;
    }
    const oldest = this.spentAtMs[0] ?? nowMs;
    return oldest + this.windowMs;
  }

  take(nowMs: number): boolean {
    this.refill(nowMs);
    if (this.spentAtMs.length >= this.capacity) {
      return false;
    }
    this.spentAtMs.push(nowMs);
    return true;
  }

  /** True when every token is back, so the bucket carries no state worth keeping. */
  isIdle(nowMs: number): boolean {
    this.refill(nowMs);
    return this.spentAtMs.length === 0;
  }

  private refill(nowMs: number): void {
    while (this.spentAtMs.length > 0 && (this.spentAtMs[0] ?? nowMs) + this.windowMs <= nowMs) {
      this.spentAtMs.shift();
    }
  }
}
