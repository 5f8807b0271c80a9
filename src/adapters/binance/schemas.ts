/**
 * Valibot schemas for Binance spot REST and WebSocket payloads.
 *
 * These schemas validate payloads at runtime to catch API drift. Decimal
 * fields decode straight into {@link Decimal} values.
 */

import * as v from "valibot";

import { decimalSchema } from "@/lib/decimal";

/** Numeric ids may exceed the safe-integer range and then arrive as strings */
export const binanceIdSchema = v.pipe(
  v.union([v.number(), v.string()]),
  v.transform((id) => String(id)),
);

export const binanceTimestampSchema = v.pipe(
  v.number(),
  v.transform((ms) => new Date(ms)),
);

/** `[price, quantity]` */
export const BinanceLevelSchema = v.pipe(
  v.tuple([decimalSchema, decimalSchema]),
  v.transform(([price, quantity]) => ({ price, quantity })),
);

// Market data

export const BinanceFilterSchema = v.looseObject({
  filterType: v.string(),
  tickSize: v.optional(decimalSchema),
  stepSize: v.optional(decimalSchema),
  minQty: v.optional(decimalSchema),
});

export const BinanceSymbolSchema = v.object({
  symbol: v.string(),
  status: v.string(),
  baseAsset: v.string(),
  quoteAsset: v.string(),
  baseAssetPrecision: v.number(),
  quoteAssetPrecision: v.number(),
  filters: v.array(BinanceFilterSchema),
});

export const BinanceExchangeInfoSchema = v.object({
  symbols: v.array(BinanceSymbolSchema),
});

export const BinanceDepthSchema = v.object({
  lastUpdateId: v.number(),
  bids: v.array(BinanceLevelSchema),
  asks: v.array(BinanceLevelSchema),
});

export const BinanceTicker24hSchema = v.object({
  symbol: v.string(),
  lastPrice: decimalSchema,
  bidPrice: decimalSchema,
  askPrice: decimalSchema,
  volume: decimalSchema,
  closeTime: binanceTimestampSchema,
});

/** `[openTime, open, high, low, close, volume, closeTime, ...]` */
export const BinanceKlineSchema = v.pipe(
  v.looseTuple([
    v.number(),
    decimalSchema,
    decimalSchema,
    decimalSchema,
    decimalSchema,
    decimalSchema,
  ]),
  v.transform(([openTime, open, high, low, close, volume]) => ({
    openTime: new Date(openTime),
    open,
    high,
    low,
    close,
    volume,
  })),
);

export const BinanceKlinesSchema = v.array(BinanceKlineSchema);

// Orders and account

export const BinanceOrderStatusSchema = v.picklist([
  "NEW",
  "PENDING_NEW",
  "PARTIALLY_FILLED",
  "FILLED",
  "PENDING_CANCEL",
  "CANCELED",
  "REJECTED",
  "EXPIRED",
  "EXPIRED_IN_MATCH",
]);

export const BinanceOrderTypeSchema = v.picklist([
  "LIMIT",
  "LIMIT_MAKER",
  "MARKET",
  "STOP_LOSS",
  "STOP_LOSS_LIMIT",
  "TAKE_PROFIT",
  "TAKE_PROFIT_LIMIT",
]);

export const BinanceOrderSchema = v.object({
  symbol: v.string(),
  orderId: binanceIdSchema,
  clientOrderId: v.string(),
  /** Present on cancellation, where `clientOrderId` names the cancel request */
  origClientOrderId: v.optional(v.string()),
  price: decimalSchema,
  origQty: decimalSchema,
  executedQty: decimalSchema,
  cummulativeQuoteQty: decimalSchema,
  status: BinanceOrderStatusSchema,
  type: BinanceOrderTypeSchema,
  side: v.picklist(["BUY", "SELL"]),
  stopPrice: v.optional(decimalSchema),
  /** Present on queries */
  time: v.optional(v.number()),
  updateTime: v.optional(v.number()),
  /** Present on placement and cancellation */
  transactTime: v.optional(v.number()),
  workingTime: v.optional(v.number()),
});

export const BinanceOrdersSchema = v.array(BinanceOrderSchema);

/** Cancel-all reports OCO lists beside plain orders */
export const BinanceCancelAllSchema = v.array(
  v.union([
    BinanceOrderSchema,
    v.object({ orderListId: v.number(), orderReports: v.array(BinanceOrderSchema) }),
  ]),
);

export const BinanceAccountTradeSchema = v.object({
  symbol: v.string(),
  id: binanceIdSchema,
  orderId: binanceIdSchema,
  price: decimalSchema,
  qty: decimalSchema,
  commission: decimalSchema,
  commissionAsset: v.string(),
  time: binanceTimestampSchema,
  isBuyer: v.boolean(),
  isMaker: v.boolean(),
});

export const BinanceAccountTradesSchema = v.array(BinanceAccountTradeSchema);

export const BinanceAccountSchema = v.object({
  balances: v.array(
    v.object({
      asset: v.string(),
      free: decimalSchema,
      locked: decimalSchema,
    }),
  ),
});

// WebSocket

export const BinanceDepthEventSchema = v.object({
  e: v.literal("depthUpdate"),
  E: binanceTimestampSchema,
  s: v.string(),
  U: v.number(),
  u: v.number(),
  b: v.array(BinanceLevelSchema),
  a: v.array(BinanceLevelSchema),
});

export const BinanceTradeEventSchema = v.object({
  e: v.literal("trade"),
  s: v.string(),
  t: binanceIdSchema,
  p: decimalSchema,
  q: decimalSchema,
  T: binanceTimestampSchema,
  /** Buyer is the maker, so the taker sold */
  m: v.boolean(),
});

export const BinanceTickerEventSchema = v.object({
  e: v.literal("24hrTicker"),
  E: binanceTimestampSchema,
  s: v.string(),
  c: decimalSchema,
  b: decimalSchema,
  a: decimalSchema,
  v: decimalSchema,
});

export const BinanceStreamResponseSchema = v.object({
  id: v.number(),
  result: v.optional(v.unknown()),
  error: v.optional(
    v.object({
      code: v.optional(v.number()),
      msg: v.string(),
    }),
  ),
});
