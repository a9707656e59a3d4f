import { systemClock, type Clock } from '../utils/sleep.js';

/**
 * In-memory per-key rate limiter. Calls sharing a key start at least
 * `minDelayMs` apart; the first call for a key never waits.
 * Single-process only, which is all a batch run needs.
 */
export class RateLimiter {
  private readonly lastRequest = new Map<string, number>();

  constructor(
    readonly minDelayMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isFinite(minDelayMs) || minDelayMs < 0) {
      throw new RangeError(`minDelayMs must be a non-negative number, got ${minDelayMs}`);
    }
  }

  /** Spacing that keeps calls within a requests-per-minute budget. */
  static perMinute(requestsPerMin: number, clock?: Clock): RateLimiter {
    if (!Number.isFinite(requestsPerMin) || requestsPerMin <= 0) {
      throw new RangeError(`requestsPerMin must be a positive number, got ${requestsPerMin}`);
    }
    return new RateLimiter(60_000 / requestsPerMin, clock);
  }

  /** Waits until the key may be used again, then records the call. Returns the wait in ms. */
  async acquire(key = 'default'): Promise<number> {
    const last = this.lastRequest.get(key);
    let waitMs = 0;

    if (last !== undefined) {
      const elapsed = this.clock.now() - last;
      if (elapsed < this.minDelayMs) {
        waitMs = this.minDelayMs - elapsed;
        await this.clock.sleep(waitMs);
      }
    }

    this.lastRequest.set(key, this.clock.now());
    return waitMs;
  }
}
