import { sleep, throwIfCancelled } from "./abort.js";

/**
 * Token bucket limiting throughput to `ratePerSec` operations per second.
 *
 * The bucket starts full. Each `wait()` reserves a token when it is called,
 * so concurrent callers are released in call order. A rate of 0 disables the
 * limiter.
 */
export class RateLimiter {
  private readonly ratePerSec: number;
  private readonly capacity: number;
  private tokens: number;
  private lastRefill: number;

  constructor(ratePerSec: number, capacity = 1, now: number = Date.now()) {
    if (!(ratePerSec >= 0) || !Number.isFinite(ratePerSec)) {
      throw new RangeError(`rate must be a finite number >= 0, got ${ratePerSec}`);
    }
    if (!(capacity >= 1)) {
      throw new RangeError(`capacity must be >= 1, got ${capacity}`);
    }
    this.ratePerSec = ratePerSec;
    this.capacity = capacity;
    this.tokens = capacity;
    this.lastRefill = now;
  }

  get enabled(): boolean {
    return this.ratePerSec > 0;
  }

  get rate(): number {
    return this.ratePerSec;
  }

  /**
   * Take one token and return how long (ms) the caller must wait for it.
   */
  reserve(now: number = Date.now()): number {
    if (!this.enabled) return 0;
    this.refill(now);
    this.tokens -= 1;
    return this.tokens >= 0 ? 0 : (-this.tokens * 1000) / this.ratePerSec;
  }

  /**
   * Waits until a token is available.
   */
  async wait(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal);
    const delay = this.reserve();
    if (delay <= 0) return;

    try {
      await sleep(delay, signal);
    } catch (error) {
      // hand the unused reservation back
      this.refill(Date.now());
      this.tokens = Math.min(this.capacity, this.tokens + 1);
      throw error;
    }
  }

  private refill(now: number): void {
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(
      this.capacity,
      this.tokens + (elapsed * this.ratePerSec) / 1000,
    );
    this.lastRefill = Math.max(this.lastRefill, now);
  }
}

/**
 * Effective rate: explicit `rate`, else one record per deprecated `readTime`.
 */
export function resolveRateLimit(rate: number, readTimeMs: number): number {
  if (rate === 0 && readTimeMs > 0) {
    return 1000 / readTimeMs;
  }
  return rate;
}
