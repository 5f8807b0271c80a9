/**
 * Exchange client exports.
 */

export type {
  Balance,
  Candle,
  CandleInterval,
  Channel,
  Credentials,
  Exchange,
  ExchangeClient,
  LiquidityRole,
  Market,
  Order,
  OrderBookSnapshot,
  OrderBookUpdate,
  OrderLookup,
  OrderRequest,
  OrderSide,
  OrderStatus,
  OrderType,
  Page,
  Paginator,
  PriceLevel,
  RequestOptions,
  SubscribeOptions,
  Subscription,
  SubscriptionKey,
  Ticker,
  TimeInForce,
  Trade,
} from "./types";

export {
  CANDLE_INTERVALS,
  candleIntervalSchema,
  channelSchema,
  credentialsSchema,
  exchangeSchema,
  isCredentials,
  isMarket,
  isOrder,
  isOrderRequest,
  isSubscriptionKey,
  isTerminalStatus,
  marketSchema,
  orderRequestSchema,
  orderSchema,
  orderSideSchema,
  orderStatusSchema,
  orderTypeSchema,
  subscriptionKeySchema,
  timeInForceSchema,
} from "./types";

export {
  ConfigError,
  DeadlineExceededError,
  ExchangeError,
  RequestAbortedError,
  isExchangeError,
  isRejection,
} from "./errors";
export type { ExchangeErrorDetails, ExchangeErrorKind, RejectionReason } from "./errors";

// Factory function
export { createExchangeClient, type ExchangeClientDependencies } from "./factory";

// Config validation
export { ClientConfigSchema, PaperMarketSchema, parseClientConfig } from "./config";
export type { ClientConfig } from "./config";

export type { ExchangeClientOptions, StreamOptions } from "./client-options";

// Exchange clients
export {
  BINANCE_ENDPOINT_WEIGHTS,
  BINANCE_RATE_LIMITS,
  createBinanceClient,
  getBinanceEndpointWeight,
  type BinanceClientOptions,
} from "./binance";
export { BYBIT_RATE_LIMITS, createBybitClient, type BybitClientOptions } from "./bybit";
export { createPaperClient, type PaperClient, type PaperClientOptions } from "./paper";
