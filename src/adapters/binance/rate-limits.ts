/**
 * Binance spot API rate limit configurations and endpoint weights.
 *
 * @see https://developers.binance.com/docs/binance-spot-api-docs/rest-api/limits
 *
 * - 6000 request weight per minute (IP-based)
 * - Orders: 100 per 10 seconds per account
 * - WebSocket: 5 incoming control messages per second
 */

import type { ExchangeRateLimitConfig } from "@/lib/rate-limiter";

export const BINANCE_RATE_LIMITS: ExchangeRateLimitConfig = {
  rest: {
    public: { maxTokens: 6000, refillRatePerSecond: 100 }, // 6000/60 = 100/s
    private: { maxTokens: 6000, refillRatePerSecond: 100 },
    orders: { maxTokens: 100, refillRatePerSecond: 10 }, // 100/10s
  },
  websocket: { maxTokens: 5, refillRatePerSecond: 5 },
  defaultTimeoutMs: 5000,
};

/**
 * Request weights keyed by `METHOD path`.
 */
export const BINANCE_ENDPOINT_WEIGHTS: Record<string, number> = {
  // Market data
  "GET /api/v3/exchangeInfo": 20,
  "GET /api/v3/ticker/24hr": 2,
  "GET /api/v3/klines": 2,

  // Account
  "GET /api/v3/account": 20,
  "GET /api/v3/myTrades": 20,

  // Orders
  "POST /api/v3/order": 1,
  "GET /api/v3/order": 4,
  "DELETE /api/v3/order": 1,
  "DELETE /api/v3/openOrders": 1,
  "GET /api/v3/allOrders": 20,
};

/** Depth weight grows with the requested limit */
export const getBinanceDepthWeight = (limit: number): number => {
  if (limit <= 100) return 5;
  if (limit <= 500) return 25;
  if (limit <= 1000) return 50;
  return 250;
};

/** Open orders cost far more across all symbols */
export const getBinanceOpenOrdersWeight = (symbol: string | undefined): number =>
  symbol === undefined ? 80 : 6;

/**
 * Gets the weight for a Binance endpoint.
 * Returns 1 for unknown endpoints.
 */
export const getBinanceEndpointWeight = (method: string, path: string): number =>
  BINANCE_ENDPOINT_WEIGHTS[`${method} ${path}`] ?? 1;
