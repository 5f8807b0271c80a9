/**
 * Exponential backoff utilities for retry logic.
 */

export interface BackoffConfig {
  /** Initial delay before first retry (ms) */
  initialDelayMs: number;
  /** Maximum delay between retries (ms) */
  maxDelayMs: number;
  /** Multiplier for exponential growth */
  multiplier: number;
  /** Jitter factor (0-1) to add randomness and prevent thundering herd */
  jitterFactor: number;
}

/**
 * Default backoff configuration for transport failures.
 * - Starts at 250ms
 * - Doubles each retry
 * - Caps at 10 seconds
 * - Adds 10% jitter
 */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 250,
  maxDelayMs: 10_000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Aggressive backoff for rate limit violations without a Retry-After hint.
 * - Starts at 1 second
 * - Triples each retry
 * - Caps at 60 seconds
 * - Adds 20% jitter
 */
export const RATE_LIMIT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  multiplier: 3,
  jitterFactor: 0.2,
};

/**
 * Backoff for WebSocket reconnects. Capped lower than REST since a stream
 * that stays down is worse than a few extra handshakes.
 */
export const RECONNECT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Calculates backoff delay for a given attempt number.
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 * @param config - Backoff configuration
 * @param random - Source of jitter, `Math.random` unless a test pins it
 * @returns Delay in milliseconds (with jitter applied)
 *
 * @example
 * ```typescript
 * // First retry: ~250ms
 * calculateBackoffMs(0);
 *
 * // Third retry: ~1000ms
 * calculateBackoffMs(2);
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
  random: () => number = Math.random,
): number => {
  const { initialDelayMs, maxDelayMs, multiplier, jitterFactor } = config;

  const baseDelayMs = initialDelayMs * multiplier ** attempt;
  const cappedDelayMs = Math.min(baseDelayMs, maxDelayMs);

  // delay * (1 + random * jitterFactor)
  const jitter = cappedDelayMs * jitterFactor * random();

  return Math.floor(cappedDelayMs + jitter);
};

/**
 * Parses a Retry-After header value.
 *
 * @param value - Header value (seconds as string, or HTTP date)
 * @returns Delay in milliseconds, or null if parsing fails
 *
 * @example
 * ```typescript
 * parseRetryAfterMs("30"); // 30000
 * parseRetryAfterMs("Wed, 21 Oct 2026 07:28:00 GMT"); // time until that date
 * ```
 */
export const parseRetryAfterMs = (value: string | null | undefined): number | null => {
  if (!value) {
    return null;
  }

  // Only accept if the entire string is a valid non-negative integer
  if (/^\d+$/.test(value)) {
    const seconds = Number.parseInt(value, 10);
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
};

/**
 * Network error codes (Node and undici) that indicate a transport failure.
 */
export const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Extracts a network error code from an error or its `cause` without casts.
 * `fetch` wraps socket errors as `TypeError("fetch failed", { cause })`.
 */
export const getNetworkErrorCode = (error: unknown): string | undefined => {
  if (error === null || typeof error !== "object") {
    return undefined;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  if ("cause" in error) {
    return getNetworkErrorCode(error.cause);
  }
  return undefined;
};

export const isNetworkError = (error: unknown): boolean => {
  const code = getNetworkErrorCode(error);
  return code !== undefined && NETWORK_ERROR_CODES.has(code);
};
