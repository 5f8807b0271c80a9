/**
 * Bybit v5 API rate limit configurations.
 *
 * @see https://bybit-exchange.github.io/docs/v5/rate-limit
 *
 * - Public: 600 requests per 5 seconds per IP (120/s)
 * - Private queries: 10 requests per second
 * - Spot orders: 20 requests per second
 * - WebSocket: 10 topics per subscribe request, modest message rate
 */

import type { ExchangeRateLimitConfig } from "@/lib/rate-limiter";

export const BYBIT_RATE_LIMITS: ExchangeRateLimitConfig = {
  rest: {
    public: { maxTokens: 600, refillRatePerSecond: 120 }, // 600/5 = 120/s
    private: { maxTokens: 10, refillRatePerSecond: 10 },
    orders: { maxTokens: 20, refillRatePerSecond: 20 },
  },
  websocket: { maxTokens: 20, refillRatePerSecond: 10 },
  defaultTimeoutMs: 5000,
};
