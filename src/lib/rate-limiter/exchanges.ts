/**
 * Per-exchange rate limit shapes.
 *
 * Exchange-specific configurations are co-located with their adapters:
 * - Binance: `src/adapters/binance/rate-limits.ts`
 * - Bybit: `src/adapters/bybit/rate-limits.ts`
 */

import type { TokenBucketConfig } from "./token-bucket";

export type { Exchange } from "@/adapters/types";

export type RestEndpointClass = "public" | "private" | "orders";

export type EndpointClass = RestEndpointClass | "websocket";

export const ENDPOINT_CLASSES: readonly EndpointClass[] = ["public", "private", "orders", "websocket"];

export interface ExchangeRateLimitConfig {
  /** REST API rate limits per endpoint class */
  rest: Record<RestEndpointClass, TokenBucketConfig>;
  /** Outbound WebSocket control messages */
  websocket: TokenBucketConfig;
  /** Default request timeout in ms */
  defaultTimeoutMs: number;
}
