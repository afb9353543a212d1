import { systemClock } from "./clock.js";
import type { Clock, Logger, RateLimiter, RateLimiterConfig } from "./types.js";

/**
 * Sliding-window admission control: at most `maxRequests` admissions in any
 * trailing `windowMs`.
 *
 * Admissions run one at a time through an internal promise chain, so
 * concurrent callers share a single quota and are admitted in call order.
 */
export class SlidingWindowLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  /** Oldest first. */
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    config: RateLimiterConfig = {},
    clock: Clock = systemClock,
    logger?: Logger,
  ) {
    this.maxRequests = config.maxRequests ?? 10;
    this.windowMs = config.windowMs ?? 60_000;
    this.clock = clock;
    this.logger = logger;

    if (!Number.isInteger(this.maxRequests) || this.maxRequests < 1) {
      throw new RangeError(
        `maxRequests must be a positive integer, got ${this.maxRequests}`,
      );
    }
    if (!(this.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${this.windowMs}`);
    }
  }

  admit(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    // Later callers queue behind this turn whether it resolves or rejects;
    // the rejection itself still reaches this caller through `turn`.
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  inWindow(): number {
    this.prune(this.clock.now());
    return this.timestamps.length;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.prune(now);

      const oldest = this.timestamps[0];
      if (this.timestamps.length < this.maxRequests || oldest === undefined) {
        this.timestamps.push(now);
        return;
      }

      const waitMs = Math.max(this.windowMs - (now - oldest), 0);
      if (waitMs >= 1_000) {
        this.logger?.info(
          `Request window full (${this.maxRequests}/${Math.round(this.windowMs / 1000)}s), waiting ${Math.ceil(waitMs / 1000)}s`,
        );
      }
      await this.clock.sleep(waitMs);
    }
  }

  private prune(now: number): void {
    let expired = 0;
    while (
      expired < this.timestamps.length &&
      now - (this.timestamps[expired] ?? now) >= this.windowMs
    ) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps = this.timestamps.slice(expired);
    }
  }
}

export function createRateLimiter(
  config: RateLimiterConfig = {},
  clock: Clock = systemClock,
  logger?: Logger,
): RateLimiter {
  return new SlidingWindowLimiter(config, clock, logger);
}
