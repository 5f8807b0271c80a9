/**
 * Exchange Bridge
 *
 * One {@link ExchangeClient} interface over Binance, Bybit and an in-memory
 * paper exchange, with request signing, weighted rate limiting, retrying REST
 * transport and supervised WebSocket streams underneath.
 *
 * @example
 * ```typescript
 * const client = createExchangeClient(
 *   parseClientConfig({ exchange: "binance", apiKey: "test-key", apiSecret: "test-secret" }),
 * );
 * const ticker = await client.getTicker("BTCUSDT");
 * ```
 */

export * from "./adapters";

export {
  createMarketCache,
  type MarketCache,
  type MarketCacheConfig,
} from "./domains/market";
export {
  applyOrderUpdate,
  createIdempotencyWindow,
  generateClientOrderId,
  type IdempotencyWindow,
  type IdempotencyWindowConfig,
  validateOrderRequest,
} from "./domains/order";

export { config } from "./lib/config";
export * from "./lib/decimal";
export { getEnv, type Env } from "./lib/env";
export { classifyResponse, createRestTransport, type FetchFn, type RestTransport } from "./lib/http";
export { createLogger, logger, type LogLevel, type Logger, type LoggerConfig } from "./lib/logger";
export {
  DEFAULT_RETRY_POLICY,
  createRateLimiter,
  createTokenBucket,
  type RateLimiter,
  type RateLimiterConfig,
  type RetryPolicy,
  type TokenBucket,
} from "./lib/rate-limiter";
export { createSigner, type Signer, type SigningScheme } from "./lib/signer";

export {
  createStreamConnection,
  createStreamManager,
  createOrderBookTracker,
  type OverflowPolicy,
  type StreamCodec,
  type StreamEvent,
  type StreamManager,
} from "./stream";
