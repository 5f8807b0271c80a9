/**
 * Normalizers for converting validated Binance payloads to domain types.
 */

import type * as v from "valibot";

import { ZERO, addDecimal, decimalScale, divideDecimal, isZeroDecimal } from "@/lib/decimal";

import type {
  Balance,
  Candle,
  CandleInterval,
  Market,
  Order,
  OrderBookSnapshot,
  OrderBookUpdate,
  OrderStatus,
  OrderType,
  Ticker,
  Trade,
} from "../types";
import type {
  BinanceAccountSchema,
  BinanceAccountTradeSchema,
  BinanceDepthEventSchema,
  BinanceDepthSchema,
  BinanceKlineSchema,
  BinanceOrderSchema,
  BinanceOrderStatusSchema,
  BinanceOrderTypeSchema,
  BinanceSymbolSchema,
  BinanceTicker24hSchema,
  BinanceTickerEventSchema,
  BinanceTradeEventSchema,
} from "./schemas";

type BinanceSymbol = v.InferOutput<typeof BinanceSymbolSchema>;
type BinanceOrder = v.InferOutput<typeof BinanceOrderSchema>;

const BINANCE_STATUS: Record<v.InferOutput<typeof BinanceOrderStatusSchema>, OrderStatus> = {
  NEW: "OPEN",
  PENDING_NEW: "OPEN",
  PARTIALLY_FILLED: "PARTIALLY_FILLED",
  FILLED: "FILLED",
  PENDING_CANCEL: "OPEN",
  CANCELED: "CANCELLED",
  REJECTED: "REJECTED",
  EXPIRED: "EXPIRED",
  EXPIRED_IN_MATCH: "EXPIRED",
};

const BINANCE_TYPE: Record<v.InferOutput<typeof BinanceOrderTypeSchema>, OrderType> = {
  LIMIT: "LIMIT",
  LIMIT_MAKER: "LIMIT",
  MARKET: "MARKET",
  STOP_LOSS: "STOP",
  STOP_LOSS_LIMIT: "STOP",
  TAKE_PROFIT: "STOP",
  TAKE_PROFIT_LIMIT: "STOP",
};

export const BINANCE_INTERVALS: Record<CandleInterval, string> = {
  "1m": "1m",
  "5m": "5m",
  "15m": "15m",
  "1h": "1h",
  "4h": "4h",
  "1d": "1d",
};

/**
 * Precision comes from the PRICE_FILTER tick size and LOT_SIZE step size;
 * the asset precision fields describe balances, not order granularity.
 * Returns null for symbols that are not trading.
 */
export const normalizeMarket = (symbol: BinanceSymbol): Market | null => {
  if (symbol.status !== "TRADING") {
    return null;
  }
  const priceFilter = symbol.filters.find((f) => f.filterType === "PRICE_FILTER");
  const lotSize = symbol.filters.find((f) => f.filterType === "LOT_SIZE");

  return {
    symbol: symbol.symbol,
    base: symbol.baseAsset,
    quote: symbol.quoteAsset,
    basePrecision: lotSize?.stepSize ? decimalScale(lotSize.stepSize) : symbol.baseAssetPrecision,
    quotePrecision: priceFilter?.tickSize
      ? decimalScale(priceFilter.tickSize)
      : symbol.quoteAssetPrecision,
    minQuantity: lotSize?.minQty ?? ZERO,
  };
};

export const normalizeOrderBook = (
  symbol: string,
  depth: v.InferOutput<typeof BinanceDepthSchema>,
  receivedAt: Date,
): OrderBookSnapshot => ({
  symbol,
  sequence: depth.lastUpdateId,
  bids: depth.bids,
  asks: depth.asks,
  timestamp: receivedAt,
});

export const normalizeTicker = (ticker: v.InferOutput<typeof BinanceTicker24hSchema>): Ticker => ({
  symbol: ticker.symbol,
  bid: isZeroDecimal(ticker.bidPrice) ? null : ticker.bidPrice,
  ask: isZeroDecimal(ticker.askPrice) ? null : ticker.askPrice,
  last: ticker.lastPrice,
  volume: ticker.volume,
  timestamp: ticker.closeTime,
});

export const normalizeCandle = (
  symbol: string,
  interval: CandleInterval,
  kline: v.InferOutput<typeof BinanceKlineSchema>,
): Candle => ({ symbol, interval, ...kline });

/**
 * Market orders report a zero price; the average fill price is derived
 * from the cumulative quote quantity.
 */
export const normalizeOrder = (order: BinanceOrder): Order => {
  const createdMs = order.time ?? order.transactTime ?? order.workingTime ?? 0;
  const updatedMs = order.updateTime ?? order.transactTime ?? createdMs;
  const stopPrice = order.stopPrice && !isZeroDecimal(order.stopPrice) ? order.stopPrice : null;

  return {
    id: order.orderId,
    clientOrderId: order.origClientOrderId ?? order.clientOrderId,
    symbol: order.symbol,
    side: order.side,
    type: BINANCE_TYPE[order.type],
    status: BINANCE_STATUS[order.status],
    quantity: order.origQty,
    filledQuantity: order.executedQty,
    price: isZeroDecimal(order.price) ? null : order.price,
    stopPrice,
    averageFillPrice: isZeroDecimal(order.executedQty)
      ? null
      : divideDecimal(order.cummulativeQuoteQty, order.executedQty, 8),
    createdAt: new Date(createdMs),
    updatedAt: new Date(updatedMs),
  };
};

export const normalizeAccountTrade = (trade: v.InferOutput<typeof BinanceAccountTradeSchema>): Trade => ({
  id: trade.id,
  orderId: trade.orderId,
  symbol: trade.symbol,
  side: trade.isBuyer ? "BUY" : "SELL",
  price: trade.price,
  quantity: trade.qty,
  fee: trade.commission,
  feeAsset: trade.commissionAsset,
  liquidity: trade.isMaker ? "MAKER" : "TAKER",
  timestamp: trade.time,
});

/** Assets with neither a free nor a locked amount are omitted */
export const normalizeBalances = (account: v.InferOutput<typeof BinanceAccountSchema>): Balance[] =>
  account.balances
    .filter((balance) => !isZeroDecimal(addDecimal(balance.free, balance.locked)))
    .map((balance) => ({ asset: balance.asset, available: balance.free, hold: balance.locked }));

// WebSocket

export const normalizeDepthEvent = (
  event: v.InferOutput<typeof BinanceDepthEventSchema>,
): OrderBookUpdate => ({
  symbol: event.s,
  sequence: event.u,
  firstSequence: event.U,
  isSnapshot: false,
  bids: event.b,
  asks: event.a,
  timestamp: event.E,
});

export const normalizeTradeEvent = (event: v.InferOutput<typeof BinanceTradeEventSchema>): Trade => ({
  id: event.t,
  orderId: null,
  symbol: event.s,
  side: event.m ? "SELL" : "BUY",
  price: event.p,
  quantity: event.q,
  fee: null,
  feeAsset: null,
  liquidity: null,
  timestamp: event.T,
});

export const normalizeTickerEvent = (event: v.InferOutput<typeof BinanceTickerEventSchema>): Ticker => ({
  symbol: event.s,
  bid: isZeroDecimal(event.b) ? null : event.b,
  ask: isZeroDecimal(event.a) ? null : event.a,
  last: event.c,
  volume: event.v,
  timestamp: event.E,
});
