/**
 * Fixed-interval request pacing shared by every task that talks to one external API.
 *
 * Slots are reserved synchronously in call order, so concurrent callers are
 * serialized onto a deterministic schedule instead of racing the quota.
 */

import type { RateLimit } from './config';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RequestPacer {
  readonly intervalMs: number;
  private nextSlot = 0;
  private readonly clock: Clock;

  constructor(requestsPerSecond: number, clock: Clock = systemClock) {
    if (!(requestsPerSecond > 0)) throw new Error(`requestsPerSecond must be > 0, got ${requestsPerSecond}`);
    this.intervalMs = 1000 / requestsPerSecond;
    this.clock = clock;
  }

  static fromRateLimit(limit: RateLimit, clock?: Clock): RequestPacer {
    return new RequestPacer(limit.quotaPerSecond * limit.safetyFactor, clock);
  }

  /** Resolves when the caller may send its request. */
  async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    const wait = slot - now;
    if (wait > 0) await this.clock.sleep(wait);
  }
}
