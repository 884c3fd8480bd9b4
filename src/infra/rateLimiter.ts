import { setTimeout as delay } from "node:timers/promises";

export interface RateLimiterOptions {
  /** Minimum spacing (ms) between two granted starts. */
  readonly minIntervalMs: number;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Spaces task starts by at least `minIntervalMs`, independently of how many
 * tasks run at once. Callers are served in the order they called
 * {@link acquire}: each acquisition chains onto the previous one.
 */
export class MinIntervalRateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private tail: Promise<void> = Promise.resolve();
  private nextAvailableAt: number | null = null;

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.minIntervalMs) || options.minIntervalMs < 0) {
      throw new TypeError("minIntervalMs must be a non-negative number");
    }
    this.minIntervalMs = options.minIntervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  /** Resolves once the caller may start; returns the granted timestamp. */
  async acquire(): Promise<number> {
    let granted = 0;
    const turn = this.tail.then(async () => {
      const current = this.now();
      const waitMs = this.nextAvailableAt !== null && this.nextAvailableAt > current ? this.nextAvailableAt - current : 0;
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
      granted = Math.max(this.nextAvailableAt ?? 0, this.now());
      this.nextAvailableAt = granted + this.minIntervalMs;
    });
    this.tail = turn.catch(() => undefined);
    await turn;
    return granted;
  }
}
