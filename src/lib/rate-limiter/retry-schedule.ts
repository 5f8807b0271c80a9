/**
 * Retry policy as an explicit state machine.
 *
 * A schedule tracks the attempt count and elapsed time of one logical
 * request. After each failure the caller asks `next(error)` whether to
 * retry and how long to wait; the schedule itself never sleeps or performs
 * I/O, so every policy decision can be tested on its own.
 */

import { isExchangeError } from "@/adapters/errors";

import {
  type BackoffConfig,
  DEFAULT_BACKOFF_CONFIG,
  RATE_LIMIT_BACKOFF_CONFIG,
  calculateBackoffMs,
} from "./backoff";

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Give up once the next attempt would start after this many ms */
  maxElapsedMs: number;
  backoff: BackoffConfig;
  /** Used for RATE_LIMITED errors without a Retry-After hint */
  rateLimitBackoff: BackoffConfig;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  maxElapsedMs: 30_000,
  backoff: DEFAULT_BACKOFF_CONFIG,
  rateLimitBackoff: RATE_LIMIT_BACKOFF_CONFIG,
};

export type GiveUpReason = "NOT_RETRYABLE" | "MAX_ATTEMPTS" | "MAX_ELAPSED";

export type RetryDecision =
  | { action: "retry"; delayMs: number; attempt: number }
  | { action: "give-up"; reason: GiveUpReason; attempts: number };

export interface RetryScheduleState {
  /** Attempts made so far */
  attempts: number;
  elapsedMs: number;
  /** Delay chosen by the last retry decision */
  nextDelayMs: number | null;
}

export interface RetrySchedule {
  /** Records the start of an attempt and returns its 1-based number */
  begin: () => number;
  /** Decides what to do after the current attempt failed with `error` */
  next: (error: unknown) => RetryDecision;
  getState: () => RetryScheduleState;
}

export interface RetryScheduleOptions {
  clock?: () => number;
  random?: () => number;
}

export const createRetrySchedule = (
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryScheduleOptions = {},
): RetrySchedule => {
  const { clock = Date.now, random = Math.random } = options;
  const startedAt = clock();
  let attempts = 0;
  let nextDelayMs: number | null = null;

  const begin = (): number => {
    attempts++;
    return attempts;
  };

  const giveUp = (reason: GiveUpReason): RetryDecision => {
    nextDelayMs = null;
    return { action: "give-up", reason, attempts };
  };

  const next = (error: unknown): RetryDecision => {
    if (!isExchangeError(error) || !error.retryable) {
      return giveUp("NOT_RETRYABLE");
    }
    if (attempts >= policy.maxAttempts) {
      return giveUp("MAX_ATTEMPTS");
    }

    const retryIndex = attempts - 1;
    const delayMs =
      error.retryAfterMs ??
      calculateBackoffMs(
        retryIndex,
        error.kind === "RATE_LIMITED" ? policy.rateLimitBackoff : policy.backoff,
        random,
      );

    if (clock() - startedAt + delayMs > policy.maxElapsedMs) {
      return giveUp("MAX_ELAPSED");
    }

    nextDelayMs = delayMs;
    return { action: "retry", delayMs, attempt: attempts + 1 };
  };

  return {
    begin,
    next,
    getState: () => ({ attempts, elapsedMs: clock() - startedAt, nextDelayMs }),
  };
};
