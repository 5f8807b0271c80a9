/**
 * Exchange client interface and the canonical data model shared by every
 * adapter. Prices, quantities and amounts are exact {@link Decimal} values.
 */

import * as v from "valibot";

import { type Decimal, decimalValueSchema } from "@/lib/decimal";
import type { StreamEvent } from "@/stream/types";

const dateSchema = v.custom<Date>((input) => input instanceof Date, "Expected Date");

// Enums
export type Exchange = "binance" | "bybit" | "paper";

export type OrderSide = "BUY" | "SELL";

export type OrderType = "LIMIT" | "MARKET" | "STOP";

export type TimeInForce = "GTC" | "IOC" | "FOK";

export type OrderStatus =
  | "OPEN"
  | "PARTIALLY_FILLED"
  | "FILLED"
  | "CANCELLED"
  | "REJECTED"
  | "EXPIRED";

export type LiquidityRole = "MAKER" | "TAKER";

export type Channel = "orderbook" | "trades" | "ticker";

export type CandleInterval = "1m" | "5m" | "15m" | "1h" | "4h" | "1d";

export const CANDLE_INTERVALS: readonly CandleInterval[] = ["1m", "5m", "15m", "1h", "4h", "1d"];

// Domain Types
export interface Market {
  /** Exchange symbol, as accepted by every other operation */
  symbol: string;
  base: string;
  quote: string;
  /** Maximum fractional digits of a quantity */
  basePrecision: number;
  /** Maximum fractional digits of a price */
  quotePrecision: number;
  minQuantity: Decimal;
}

export interface Credentials {
  exchange: Exchange;
  apiKey: string;
  apiSecret: string;
  passphrase?: string;
}

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: Decimal;
  price?: Decimal; // Required for LIMIT
  stopPrice?: Decimal; // Required for STOP
  timeInForce?: TimeInForce;
  /** Idempotency token. Generated when omitted. */
  clientOrderId?: string;
}

export interface Order {
  id: string;
  clientOrderId: string | null;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  status: OrderStatus;
  quantity: Decimal;
  filledQuantity: Decimal;
  price: Decimal | null; // null for market orders
  stopPrice: Decimal | null;
  averageFillPrice: Decimal | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderLookup {
  symbol: string;
  orderId?: string;
  clientOrderId?: string;
}

export interface Trade {
  id: string;
  orderId: string | null; // null on public trade streams
  symbol: string;
  side: OrderSide;
  price: Decimal;
  quantity: Decimal;
  fee: Decimal | null;
  feeAsset: string | null;
  liquidity: LiquidityRole | null;
  timestamp: Date;
}

export interface Balance {
  asset: string;
  available: Decimal;
  hold: Decimal;
}

export interface PriceLevel {
  price: Decimal;
  quantity: Decimal;
}

export interface OrderBookSnapshot {
  symbol: string;
  sequence: number;
  bids: PriceLevel[]; // best (highest) first
  asks: PriceLevel[]; // best (lowest) first
  timestamp: Date;
}

export interface OrderBookUpdate {
  symbol: string;
  /** Last sequence number covered by this event */
  sequence: number;
  /** First sequence number covered, for exchanges that batch a range */
  firstSequence?: number;
  isSnapshot: boolean;
  /** Level deltas; quantity zero removes the level */
  bids: PriceLevel[];
  asks: PriceLevel[];
  timestamp: Date;
}

export interface Ticker {
  symbol: string;
  bid: Decimal | null;
  ask: Decimal | null;
  last: Decimal;
  volume: Decimal;
  timestamp: Date;
}

export interface Candle {
  symbol: string;
  interval: CandleInterval;
  openTime: Date;
  open: Decimal;
  high: Decimal;
  low: Decimal;
  close: Decimal;
  volume: Decimal;
}

export interface Paginator {
  limit?: number;
  startTime?: Date;
  endTime?: Date;
  /** Opaque cursor from a previous page */
  cursor?: string;
}

export interface Page<T> {
  items: T[];
  /** Pass back as `cursor` for the next page; null on the last page */
  nextCursor: string | null;
}

export interface SubscriptionKey {
  symbol: string;
  channel: Channel;
}

export interface RequestOptions {
  signal?: AbortSignal;
  /** Overall deadline for the operation, including rate-limit waits and retries */
  timeoutMs?: number;
}

export interface SubscribeOptions {
  signal?: AbortSignal;
}

/**
 * Cancellable, ordered sequence of stream events for one (symbol, channel).
 */
export interface Subscription extends AsyncIterable<StreamEvent> {
  readonly key: SubscriptionKey;
  unsubscribe: () => void;
}

// Valibot Schemas
export const exchangeSchema = v.picklist(["binance", "bybit", "paper"] as const);

export const orderSideSchema = v.picklist(["BUY", "SELL"] as const);

export const orderTypeSchema = v.picklist(["LIMIT", "MARKET", "STOP"] as const);

export const timeInForceSchema = v.picklist(["GTC", "IOC", "FOK"] as const);

export const orderStatusSchema = v.picklist([
  "OPEN",
  "PARTIALLY_FILLED",
  "FILLED",
  "CANCELLED",
  "REJECTED",
  "EXPIRED",
] as const);

export const channelSchema = v.picklist(["orderbook", "trades", "ticker"] as const);

export const candleIntervalSchema = v.picklist(CANDLE_INTERVALS);

const nonEmptyString = v.pipe(v.string(), v.minLength(1));

// Keys and secrets never contain whitespace; a stray newline from a
// credentials file is the usual culprit.
const credentialString = v.pipe(v.string(), v.minLength(1), v.regex(/^\S+$/, "Must not contain whitespace"));

export const credentialsSchema = v.object({
  exchange: exchangeSchema,
  apiKey: credentialString,
  apiSecret: credentialString,
  passphrase: v.optional(credentialString),
});

export const orderRequestSchema = v.object({
  symbol: nonEmptyString,
  side: orderSideSchema,
  type: orderTypeSchema,
  quantity: decimalValueSchema,
  price: v.optional(decimalValueSchema),
  stopPrice: v.optional(decimalValueSchema),
  timeInForce: v.optional(timeInForceSchema),
  clientOrderId: v.optional(
    v.pipe(v.string(), v.regex(/^[A-Za-z0-9_-]{1,36}$/, "Expected 1-36 characters [A-Za-z0-9_-]")),
  ),
});

export const marketSchema = v.object({
  symbol: nonEmptyString,
  base: nonEmptyString,
  quote: nonEmptyString,
  basePrecision: v.pipe(v.number(), v.integer(), v.minValue(0)),
  quotePrecision: v.pipe(v.number(), v.integer(), v.minValue(0)),
  minQuantity: decimalValueSchema,
});

export const orderSchema = v.object({
  id: v.string(),
  clientOrderId: v.nullable(v.string()),
  symbol: v.string(),
  side: orderSideSchema,
  type: orderTypeSchema,
  status: orderStatusSchema,
  quantity: decimalValueSchema,
  filledQuantity: decimalValueSchema,
  price: v.nullable(decimalValueSchema),
  stopPrice: v.nullable(decimalValueSchema),
  averageFillPrice: v.nullable(decimalValueSchema),
  createdAt: dateSchema,
  updatedAt: dateSchema,
});

export const subscriptionKeySchema = v.object({
  symbol: nonEmptyString,
  channel: channelSchema,
});

// Type Guards (using Valibot)
export const isCredentials = (value: unknown): value is Credentials =>
  v.is(credentialsSchema, value);

export const isOrderRequest = (value: unknown): value is OrderRequest =>
  v.is(orderRequestSchema, value);

export const isMarket = (value: unknown): value is Market => v.is(marketSchema, value);

export const isOrder = (value: unknown): value is Order => v.is(orderSchema, value);

export const isSubscriptionKey = (value: unknown): value is SubscriptionKey =>
  v.is(subscriptionKeySchema, value);

export const isTerminalStatus = (status: OrderStatus): boolean =>
  status === "FILLED" || status === "CANCELLED" || status === "REJECTED" || status === "EXPIRED";

// Exchange Client Interface
export interface ExchangeClient {
  readonly exchange: Exchange;

  // Connection management
  connect(options?: RequestOptions): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  // Market data
  getMarkets(options?: RequestOptions): Promise<Market[]>;
  refreshMarkets(options?: RequestOptions): Promise<Market[]>;
  getOrderBook(symbol: string, depth?: number, options?: RequestOptions): Promise<OrderBookSnapshot>;
  getTicker(symbol: string, options?: RequestOptions): Promise<Ticker>;
  getCandles(
    symbol: string,
    interval: CandleInterval,
    paginator?: Paginator,
    options?: RequestOptions,
  ): Promise<Candle[]>;

  // Orders
  placeOrder(request: OrderRequest, options?: RequestOptions): Promise<Order>;
  cancelOrder(lookup: OrderLookup, options?: RequestOptions): Promise<Order>;
  cancelAllOrders(symbol: string, options?: RequestOptions): Promise<Order[]>;
  getOrder(lookup: OrderLookup, options?: RequestOptions): Promise<Order>;
  getOpenOrders(symbol?: string, options?: RequestOptions): Promise<Order[]>;
  getOrderHistory(symbol: string, paginator?: Paginator, options?: RequestOptions): Promise<Page<Order>>;
  getTradeHistory(symbol: string, paginator?: Paginator, options?: RequestOptions): Promise<Page<Trade>>;

  // Account
  getBalances(options?: RequestOptions): Promise<Balance[]>;

  // Streaming
  subscribe(key: SubscriptionKey, options?: SubscribeOptions): Subscription;
}
