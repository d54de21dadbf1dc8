/**
 * Minimum-interval rate limiter for provider calls.
 */
export class RateLimiter {
  private lastCall = 0;
  private readonly minIntervalMs: number;

  /**
   * @param callsPerMinute - 0 disables limiting
   */
  constructor(callsPerMinute: number) {
    this.minIntervalMs = callsPerMinute > 0 ? (60 * 1000) / callsPerMinute : 0;
  }

  get intervalMs(): number {
    return this.minIntervalMs;
  }

  /**
   * Resolves at this caller's slot. The slot is reserved before sleeping,
   * so concurrent callers are spaced one interval apart.
   */
  async wait(): Promise<void> {
    if (this.minIntervalMs === 0) return;
    const now = Date.now();
    const slot = Math.max(now, this.lastCall + this.minIntervalMs);
    this.lastCall = slot;
    if (slot > now) {
      await new Promise((resolve) => setTimeout(resolve, slot - now));
    }
  }
}
