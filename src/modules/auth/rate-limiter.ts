import type { RateLimitConfig } from '../../config/index.js';

export type RateLimitDecision = { allowed: true } | { allowed: false; retryAfterSeconds: number };

/** Sliding-window limiter keyed by caller; `maxRequests <= 0` disables it. */
export class SlidingWindowRateLimiter {
  private readonly hits = new Map<string, number[]>();
  private lastSweep = 0;

  constructor(
    private readonly config: RateLimitConfig,
    private readonly now: () => number = Date.now,
  ) {}

  get enabled(): boolean {
    return this.config.maxRequests > 0;
  }

  check(key: string): RateLimitDecision {
    if (!this.enabled) {
      return { allowed: true };
    }
    const now = this.now();
    const windowStart = now - this.config.windowMs;
    this.sweep(now, windowStart);
    const recent = (this.hits.get(key) ?? []).filter(timestamp => timestamp > windowStart);
    if (recent.length >= this.config.maxRequests) {
      this.hits.set(key, recent);
      const oldest = recent[0];
      const retryAfterSeconds = Math.max(1, Math.floor((oldest + this.config.windowMs - now) / 1000) + 1);
      return { allowed: false, retryAfterSeconds };
    }
    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true };
  }

  /** Number of callers currently tracked. */
  get trackedKeys(): number {
    return this.hits.size;
  }

  reset(): void {
    this.hits.clear();
  }

  /** Drops callers whose newest hit left the window; runs at most once per window. */
  private sweep(now: number, windowStart: number): void {
    if (now - this.lastSweep < this.config.windowMs) {
      return;
    }
    this.lastSweep = now;
    for (const [key, timestamps] of this.hits) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || newest <= windowStart) {
        this.hits.delete(key);
      }
    }
  }
}
