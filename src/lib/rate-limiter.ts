export interface RateLimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const realClock: RateLimiterClock = {
  now: () => Date.now(),
  sleep: ms => new Promise(ok => setTimeout(ok, ms)),
};

/**
 * Hands out permits at a fixed rate, evenly spaced.
 * Each acquire reserves the next free slot, so concurrent callers queue up
 * instead of bursting past the provider's QPS quota.
 */
export class RateLimiter {
  constructor(
    public readonly permitsPerSecond: number,
    private readonly clock: RateLimiterClock = realClock,
  ) {
    if (!(permitsPerSecond > 0)) throw new Error(
      `permitsPerSecond must be positive, got ${permitsPerSecond}`);
    this.intervalMs = 1000 / permitsPerSecond;
  }
  private readonly intervalMs: number;
  private nextFreeAt = 0;

  /** Resolves once a permit is available; returns how long it waited */
  async acquire(): Promise<number> {
    const now = this.clock.now();
    const grantedAt = Math.max(now, this.nextFreeAt);
    this.nextFreeAt = grantedAt + this.intervalMs;

    const waitMs = grantedAt - now;
    if (waitMs > 0) await this.clock.sleep(waitMs);
    return waitMs;
  }
}
