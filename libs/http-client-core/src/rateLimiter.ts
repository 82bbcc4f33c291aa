import type { HttpRateLimiter } from './types';

export interface SlidingWindowRateLimiterOptions {
  maxRequests: number;
  windowMs: number;
}

/**
 * Allows at most `maxRequests` acquisitions in any trailing `windowMs` window.
 *
 * Callers queue on a promise chain, so concurrent `throttle()` calls are granted
 * one at a time in arrival order. `throttle()` never rejects.
 */
export class SlidingWindowRateLimiter implements HttpRateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly grants: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: SlidingWindowRateLimiterOptions) {
    if (!Number.isFinite(options.maxRequests) || options.maxRequests <= 0) {
      throw new Error('maxRequests must be > 0');
    }
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
      throw new Error('windowMs must be > 0');
    }
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
  }

  throttle(): Promise<void> {
    const turn = this.tail.then(() => this.acquire());
    this.tail = turn;
    return turn;
  }

  /** Acquisitions still inside the trailing window. */
  inFlightWindowCount(now = Date.now()): number {
    this.evict(now);
    return this.grants.length;
  }

  private async acquire(): Promise<void> {
    for (;;) {
      const now = Date.now();
      this.evict(now);

      if (this.grants.length < this.maxRequests) {
        this.grants.push(now);
        return;
      }

      const waitMs = this.grants[0] + this.windowMs - now;
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }

  private evict(now: number): void {
    const windowStart = now - this.windowMs;
    while (this.grants.length > 0 && this.grants[0] <= windowStart) {
      this.grants.shift();
    }
  }
}

export class NoopRateLimiter implements HttpRateLimiter {
  async throttle(): Promise<void> {
    // no-op
  }
}
