/**
 * Rate limiter module exports.
 */

// Token bucket
export { createTokenBucket, type TokenBucket, type TokenBucketConfig } from "./token-bucket";

// Backoff utilities
export {
  calculateBackoffMs,
  DEFAULT_BACKOFF_CONFIG,
  getNetworkErrorCode,
  isNetworkError,
  NETWORK_ERROR_CODES,
  parseRetryAfterMs,
  RATE_LIMIT_BACKOFF_CONFIG,
  RECONNECT_BACKOFF_CONFIG,
  type BackoffConfig,
} from "./backoff";

// Retry schedule
export {
  createRetrySchedule,
  DEFAULT_RETRY_POLICY,
  type GiveUpReason,
  type RetryDecision,
  type RetryPolicy,
  type RetrySchedule,
  type RetryScheduleState,
} from "./retry-schedule";

// Circuit breaker
export {
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  isTransportFailure,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";

// Exchange types
export {
  ENDPOINT_CLASSES,
  type EndpointClass,
  type Exchange,
  type ExchangeRateLimitConfig,
  type RestEndpointClass,
} from "./exchanges";

// Per-exchange admission (main entry point)
export {
  createRateLimiter,
  type AcquireOptions,
  type RateLimiter,
  type RateLimiterConfig,
  type RateLimiterMetrics,
} from "./rate-limiter";
