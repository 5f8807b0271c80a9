/**
 * Token bucket with reservations.
 *
 * `reserve` takes tokens at call time even when that drives the balance
 * negative; the returned wait is how long the caller must sleep before the
 * debt is repaid by refill. Concurrent callers therefore queue behind each
 * other's reservations instead of all waking up for the same tokens.
 */

export interface TokenBucketConfig {
  /** Maximum bucket capacity (tokens) */
  maxTokens: number;
  /** Tokens added per second */
  refillRatePerSecond: number;
  /** Starting tokens (default: maxTokens) */
  initialTokens?: number;
}

export interface TokenBucket {
  /** Consumes tokens only if available right now */
  tryConsume: (tokens?: number) => boolean;
  /** Takes tokens now and returns how long (ms) the caller must wait */
  reserve: (tokens?: number) => number;
  /** Returns tokens from a reservation that was abandoned */
  refund: (tokens: number) => void;
  /** Returns the token balance (negative while reservations are outstanding) */
  getAvailableTokens: () => number;
  /** Returns the wait time in ms needed to consume tokens */
  getWaitTimeMs: (tokens?: number) => number;
  /** Resets the bucket to full capacity */
  reset: () => void;
  /** Blocks the bucket for `durationMs` (after a 429 or a ban) */
  penalize: (durationMs: number) => void;
  getCapacity: () => number;
}

interface TokenBucketState {
  tokens: number;
  lastRefillTimestamp: number;
  blockedUntil: number;
}

/**
 * Creates a token bucket rate limiter.
 *
 * @example
 * ```typescript
 * const bucket = createTokenBucket({
 *   maxTokens: 10,
 *   refillRatePerSecond: 10,
 * });
 *
 * if (bucket.tryConsume()) {
 *   // Make request
 * }
 *
 * const waitMs = bucket.reserve(5);
 * await sleep(waitMs);
 * // Make request
 * ```
 */
export const createTokenBucket = (config: TokenBucketConfig): TokenBucket => {
  const { maxTokens, refillRatePerSecond, initialTokens = maxTokens } = config;

  let state: TokenBucketState = {
    tokens: initialTokens,
    lastRefillTimestamp: Date.now(),
    blockedUntil: 0,
  };

  const refill = (): void => {
    const now = Date.now();
    const elapsedSeconds = (now - state.lastRefillTimestamp) / 1000;
    const tokensToAdd = elapsedSeconds * refillRatePerSecond;

    state = {
      ...state,
      tokens: Math.min(maxTokens, state.tokens + tokensToAdd),
      lastRefillTimestamp: now,
    };
  };

  const getWaitTimeMs = (tokens = 1): number => {
    refill();

    const blockedMs = Math.max(0, state.blockedUntil - Date.now());
    if (state.tokens >= tokens) {
      return blockedMs;
    }

    const tokensNeeded = tokens - state.tokens;
    const refillMs = Math.ceil((tokensNeeded / refillRatePerSecond) * 1000);
    return Math.max(refillMs, blockedMs);
  };

  const tryConsume = (tokens = 1): boolean => {
    if (getWaitTimeMs(tokens) > 0) {
      return false;
    }
    state = { ...state, tokens: state.tokens - tokens };
    return true;
  };

  const reserve = (tokens = 1): number => {
    const waitTimeMs = getWaitTimeMs(tokens);
    state = { ...state, tokens: state.tokens - tokens };
    return waitTimeMs;
  };

  const refund = (tokens: number): void => {
    refill();
    state = { ...state, tokens: Math.min(maxTokens, state.tokens + tokens) };
  };

  const getAvailableTokens = (): number => {
    refill();
    return state.tokens;
  };

  const reset = (): void => {
    state = {
      tokens: maxTokens,
      lastRefillTimestamp: Date.now(),
      blockedUntil: 0,
    };
  };

  const penalize = (durationMs: number): void => {
    refill();
    state = {
      ...state,
      blockedUntil: Math.max(state.blockedUntil, Date.now() + durationMs),
    };
  };

  return {
    tryConsume,
    reserve,
    refund,
    getAvailableTokens,
    getWaitTimeMs,
    reset,
    penalize,
    getCapacity: () => maxTokens,
  };
};
