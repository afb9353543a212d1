/**
 * Throttled request executor.
 *
 * Wraps a single request function in sliding-window admission control and
 * a bounded retry loop. Every attempt that is actually sent takes one slot
 * in the window; time spent in retry backoff does not.
 */

import { systemClock } from "./clock.js";
import { errorMessage } from "./errors.js";
import { classifyError, createRetryState, decideRetry } from "./retry.js";
import type {
  Clock,
  Logger,
  RateLimiter,
  RequestExecutor,
  RetryOptions,
} from "./types.js";

export class ThrottledExecutor implements RequestExecutor {
  private readonly limiter: RateLimiter;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retry: RetryOptions;

  constructor(opts: {
    limiter: RateLimiter;
    logger: Logger;
    clock?: Clock;
    retry?: RetryOptions;
  }) {
    this.limiter = opts.limiter;
    this.logger = opts.logger;
    this.clock = opts.clock ?? systemClock;
    this.retry = opts.retry ?? {};
  }

  async execute<T>(label: string, requestFn: () => Promise<T>): Promise<T> {
    let state = createRetryState(this.retry.maxRetries);

    for (;;) {
      await this.limiter.admit();

      try {
        return await requestFn();
      } catch (err: unknown) {
        const outcome = classifyError(err, this.retry.isFatal);
        const decision = decideRetry(outcome, state, this.retry);

        if (decision.action !== "retry") {
          if (outcome.kind !== "fatal") {
            this.logger.error(
              `Giving up on ${label} after ${state.attempt} retries: ${errorMessage(err)}`,
            );
          }
          throw err;
        }

        state = decision.state;
        const waitSec = Math.round(decision.delayMs / 1000);
        if (outcome.kind === "rate-limited") {
          this.logger.warn(
            `Rate limited on ${label}, retrying in ${waitSec}s (attempt ${state.attempt}/${state.maxRetries})`,
          );
        } else {
          this.logger.warn(
            `Request ${label} failed (${errorMessage(err)}), retrying in ${waitSec}s (attempt ${state.attempt}/${state.maxRetries})`,
          );
        }
        await this.clock.sleep(decision.delayMs);
      }
    }
  }
}
