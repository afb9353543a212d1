import { systemClock } from "./clock.js";
import { readHeader, readStatus } from "./errors.js";
import type {
  AttemptOutcome,
  Clock,
  RetryDecision,
  RetryOptions,
  RetryState,
} from "./types.js";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_AFTER_MS = 60_000;
export const MAX_BACKOFF_MS = 30_000;

/**
 * Parse a `Retry-After` value given in whole seconds. HTTP-date,
 * fractional and negative values are not honored.
 */
export function parseRetryAfter(
  value: string | null | undefined,
): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10) * 1000;
}

export function classifyError(
  err: unknown,
  isFatal?: (err: unknown) => boolean,
): AttemptOutcome<never> {
  if (readStatus(err) === 429) {
    return {
      kind: "rate-limited",
      retryAfterMs: parseRetryAfter(readHeader(err, "retry-after")),
      error: err,
    };
  }
  if (isFatal?.(err)) {
    return { kind: "fatal", error: err };
  }
  return { kind: "transient", error: err };
}

export function createRetryState(
  maxRetries: number = DEFAULT_MAX_RETRIES,
): RetryState {
  return { attempt: 0, maxRetries };
}

/**
 * Decide what follows an attempt. Retries are counted from 1, so transient
 * backoff runs 2s, 4s, 8s, … up to the cap.
 */
export function decideRetry<T>(
  outcome: AttemptOutcome<T>,
  state: RetryState,
  opts: RetryOptions = {},
): RetryDecision {
  if (outcome.kind === "success") return { action: "done" };
  if (outcome.kind === "fatal") return { action: "give-up" };

  const attempt = state.attempt + 1;
  if (attempt > state.maxRetries) return { action: "give-up" };

  const delayMs =
    outcome.kind === "rate-limited"
      ? (outcome.retryAfterMs ??
        opts.defaultRetryAfterMs ??
        DEFAULT_RETRY_AFTER_MS)
      : Math.min(2 ** attempt * 1000, opts.maxBackoffMs ?? MAX_BACKOFF_MS);

  return {
    action: "retry",
    delayMs,
    state: { attempt, maxRetries: state.maxRetries },
  };
}

/**
 * Retry `fn` under the same rules as the throttled executor, without
 * admission control. Used for calls that sit outside the request quota.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions & {
    clock?: Clock;
    onRetry?: (err: unknown, delayMs: number, attempt: number) => void;
  } = {},
): Promise<T> {
  const clock = opts.clock ?? systemClock;
  let state = createRetryState(opts.maxRetries);

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      const decision = decideRetry(
        classifyError(err, opts.isFatal),
        state,
        opts,
      );
      if (decision.action !== "retry") throw err;
      state = decision.state;
      opts.onRetry?.(err, decision.delayMs, state.attempt);
      await clock.sleep(decision.delayMs);
    }
  }
}
