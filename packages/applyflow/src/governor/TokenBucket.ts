/**
 * Continuous-refill token bucket: `capacity` tokens per `windowMs`.
 * Starts full. Time comes from the caller so tests can drive it.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;

  constructor(
    readonly capacity: number,
    readonly windowMs: number,
    now: number,
  ) {
    if (capacity <= 0) throw new Error(`Token bucket capacity must be positive, got ${capacity}`);
    if (windowMs <= 0) throw new Error(`Token bucket window must be positive, got ${windowMs}`);
    this.tokens = capacity;
    this.lastRefill = now;
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.capacity) / this.windowMs);
    this.lastRefill = now;
  }

  available(now: number): number {
    this.refill(now);
    return this.tokens;
  }

  tryTake(now: number): boolean {
    this.refill(now);
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  /** Undo a take whose work never ran. */
  refund(now: number): void {
    this.refill(now);
    this.tokens = Math.min(this.capacity, this.tokens + 1);
  }

  /** Milliseconds until a whole token is available (0 if one is available now). */
  msUntilAvailable(now: number): number {
    this.refill(now);
    if (this.tokens >= 1) return 0;
    return Math.ceil(((1 - this.tokens) * this.windowMs) / this.capacity);
  }
}
