/**
 * Admission control for one exchange: an independent token bucket per
 * endpoint class, so saturating order placement never starves market data.
 */

import { DeadlineExceededError } from "@/adapters/errors";
import { sleep, throwIfAborted } from "@/lib/async";
import { type Logger, logger as defaultLogger } from "@/lib/logger";

import type { EndpointClass, ExchangeRateLimitConfig } from "./exchanges";
import { type TokenBucket, createTokenBucket } from "./token-bucket";

export interface RateLimiterConfig {
  exchange: string;
  limits: ExchangeRateLimitConfig;
  logger?: Logger;
}

export interface AcquireOptions {
  /** Tokens this request costs (default: 1) */
  weight?: number;
  /** Fail instead of waiting longer than this */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RateLimiterMetrics {
  admitted: number;
  waits: number;
  waitTimeMs: number;
  deadlineExceeded: number;
  aborted: number;
  penalties: number;
}

export interface RateLimiter {
  readonly exchange: string;
  /**
   * Resolves once the request may proceed. Capacity is reserved at call
   * time. Rejects with DeadlineExceededError when the wait would exceed
   * `timeoutMs` (nothing is reserved) or RequestAbortedError on abort
   * (the reservation is refunded).
   */
  acquire: (endpointClass: EndpointClass, options?: AcquireOptions) => Promise<void>;
  /** Admits only if no wait is needed */
  tryAcquire: (endpointClass: EndpointClass, weight?: number) => boolean;
  /** Blocks a class for `durationMs`, typically after a 429 */
  penalize: (endpointClass: EndpointClass, durationMs: number) => void;
  getAvailableTokens: (endpointClass: EndpointClass) => number;
  getMetrics: () => RateLimiterMetrics;
}

const emptyMetrics = (): RateLimiterMetrics => ({
  admitted: 0,
  waits: 0,
  waitTimeMs: 0,
  deadlineExceeded: 0,
  aborted: 0,
  penalties: 0,
});

/**
 * Creates a rate limiter for one exchange.
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter({ exchange: "binance", limits: BINANCE_RATE_LIMITS });
 * await limiter.acquire("orders", { weight: 1, timeoutMs: 2000 });
 * ```
 */
export const createRateLimiter = (config: RateLimiterConfig): RateLimiter => {
  const { exchange, limits } = config;
  const log = (config.logger ?? defaultLogger).child({ exchange, component: "rate-limiter" });

  const buckets: Record<EndpointClass, TokenBucket> = {
    public: createTokenBucket(limits.rest.public),
    private: createTokenBucket(limits.rest.private),
    orders: createTokenBucket(limits.rest.orders),
    websocket: createTokenBucket(limits.websocket),
  };

  const metrics = emptyMetrics();

  const acquire = async (
    endpointClass: EndpointClass,
    options: AcquireOptions = {},
  ): Promise<void> => {
    const { weight = 1, timeoutMs, signal } = options;
    throwIfAborted(signal);

    const bucket = buckets[endpointClass];
    if (weight > bucket.getCapacity()) {
      throw new RangeError(
        `Weight ${weight} exceeds ${endpointClass} bucket capacity ${bucket.getCapacity()}`,
      );
    }

    const waitTimeMs = bucket.getWaitTimeMs(weight);
    if (timeoutMs !== undefined && waitTimeMs > timeoutMs) {
      metrics.deadlineExceeded++;
      throw new DeadlineExceededError(
        `Rate limit wait of ${waitTimeMs}ms for ${exchange} ${endpointClass} exceeds ${timeoutMs}ms`,
        timeoutMs,
      );
    }

    bucket.reserve(weight);

    if (waitTimeMs > 0) {
      metrics.waits++;
      metrics.waitTimeMs += waitTimeMs;
      log.debug("Rate limit wait", { endpointClass, weight, waitTimeMs });
      try {
        await sleep(waitTimeMs, signal);
      } catch (error) {
        bucket.refund(weight);
        metrics.aborted++;
        throw error;
      }
    }

    metrics.admitted++;
  };

  const tryAcquire = (endpointClass: EndpointClass, weight = 1): boolean => {
    const admitted = buckets[endpointClass].tryConsume(weight);
    if (admitted) metrics.admitted++;
    return admitted;
  };

  const penalize = (endpointClass: EndpointClass, durationMs: number): void => {
    metrics.penalties++;
    log.warn("Endpoint class penalized", { endpointClass, durationMs });
    buckets[endpointClass].penalize(durationMs);
  };

  return {
    exchange,
    acquire,
    tryAcquire,
    penalize,
    getAvailableTokens: (endpointClass) => buckets[endpointClass].getAvailableTokens(),
    getMetrics: () => ({ ...metrics }),
  };
};
