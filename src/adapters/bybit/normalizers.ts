/**
 * Normalizers for converting validated Bybit v5 payloads to domain types.
 */

import type * as v from "valibot";

import { ZERO, decimalScale, isZeroDecimal, subtractDecimal } from "@/lib/decimal";

import type {
  Balance,
  Candle,
  CandleInterval,
  Market,
  Order,
  OrderBookSnapshot,
  OrderBookUpdate,
  OrderSide,
  OrderStatus,
  Ticker,
  Trade,
} from "../types";
import type {
  BybitBookMessageSchema,
  BybitExecutionSchema,
  BybitInstrumentSchema,
  BybitKlineSchema,
  BybitOrderBookSchema,
  BybitOrderSchema,
  BybitOrderStatusSchema,
  BybitTickerMessageSchema,
  BybitTickerSchema,
  BybitTradeMessageSchema,
  BybitWalletBalanceSchema,
} from "./schemas";

type BybitOrder = v.InferOutput<typeof BybitOrderSchema>;

const BYBIT_STATUS: Record<v.InferOutput<typeof BybitOrderStatusSchema>, OrderStatus> = {
  New: "OPEN",
  PartiallyFilled: "PARTIALLY_FILLED",
  Untriggered: "OPEN",
  Triggered: "OPEN",
  Rejected: "REJECTED",
  PartiallyFilledCanceled: "CANCELLED",
  Filled: "FILLED",
  Cancelled: "CANCELLED",
  Deactivated: "CANCELLED",
};

export const BYBIT_INTERVALS: Record<CandleInterval, string> = {
  "1m": "1",
  "5m": "5",
  "15m": "15",
  "1h": "60",
  "4h": "240",
  "1d": "D",
};

export const toBybitSide = (side: OrderSide): "Buy" | "Sell" => (side === "BUY" ? "Buy" : "Sell");

export const fromBybitSide = (side: "Buy" | "Sell"): OrderSide => (side === "Buy" ? "BUY" : "SELL");

/** Returns null for instruments that are not trading */
export const normalizeMarket = (instrument: v.InferOutput<typeof BybitInstrumentSchema>): Market | null => {
  if (instrument.status !== "Trading") {
    return null;
  }
  return {
    symbol: instrument.symbol,
    base: instrument.baseCoin,
    quote: instrument.quoteCoin,
    basePrecision: decimalScale(instrument.lotSizeFilter.basePrecision),
    quotePrecision: decimalScale(instrument.priceFilter.tickSize),
    minQuantity: instrument.lotSizeFilter.minOrderQty,
  };
};

export const normalizeOrderBook = (
  response: v.InferOutput<typeof BybitOrderBookSchema>,
): OrderBookSnapshot => ({
  symbol: response.result.s,
  sequence: response.result.u,
  bids: response.result.b,
  asks: response.result.a,
  timestamp: new Date(response.result.ts),
});

export const normalizeTicker = (ticker: v.InferOutput<typeof BybitTickerSchema>, time: number): Ticker => ({
  symbol: ticker.symbol,
  bid: ticker.bid1Price,
  ask: ticker.ask1Price,
  last: ticker.lastPrice,
  volume: ticker.volume24h,
  timestamp: new Date(time),
});

export const normalizeCandle = (
  symbol: string,
  interval: CandleInterval,
  kline: v.InferOutput<typeof BybitKlineSchema>,
): Candle => ({ symbol, interval, ...kline });

/**
 * Conditional orders carry a trigger price; market orders report price "0".
 */
export const normalizeOrder = (order: BybitOrder): Order => {
  const stopPrice = order.triggerPrice && !isZeroDecimal(order.triggerPrice) ? order.triggerPrice : null;
  const price = order.price && !isZeroDecimal(order.price) ? order.price : null;

  return {
    id: order.orderId,
    clientOrderId: order.orderLinkId === "" ? null : order.orderLinkId,
    symbol: order.symbol,
    side: fromBybitSide(order.side),
    type: stopPrice ? "STOP" : order.orderType === "Limit" ? "LIMIT" : "MARKET",
    status: BYBIT_STATUS[order.orderStatus],
    quantity: order.qty,
    filledQuantity: order.cumExecQty,
    price,
    stopPrice,
    averageFillPrice: order.avgPrice && !isZeroDecimal(order.avgPrice) ? order.avgPrice : null,
    createdAt: order.createdTime,
    updatedAt: order.updatedTime,
  };
};

export const normalizeExecution = (execution: v.InferOutput<typeof BybitExecutionSchema>): Trade => ({
  id: execution.execId,
  orderId: execution.orderId,
  symbol: execution.symbol,
  side: fromBybitSide(execution.side),
  price: execution.execPrice,
  quantity: execution.execQty,
  fee: execution.execFee,
  feeAsset: execution.feeCurrency ?? null,
  liquidity: execution.isMaker ? "MAKER" : "TAKER",
  timestamp: execution.execTime,
});

/** Available is the wallet balance net of what open orders lock */
export const normalizeBalances = (wallet: v.InferOutput<typeof BybitWalletBalanceSchema>): Balance[] =>
  wallet.result.list.flatMap((account) =>
    account.coin.flatMap((coin) => {
      const total = coin.walletBalance ?? ZERO;
      const hold = coin.locked ?? ZERO;
      if (isZeroDecimal(total) && isZeroDecimal(hold)) {
        return [];
      }
      return [{ asset: coin.coin, available: subtractDecimal(total, hold), hold }];
    }),
  );

// WebSocket

export const normalizeBookMessage = (message: v.InferOutput<typeof BybitBookMessageSchema>): OrderBookUpdate => ({
  symbol: message.data.s,
  sequence: message.data.u,
  // u=1 means the service restarted and the delta is a full book
  isSnapshot: message.type === "snapshot" || message.data.u === 1,
  bids: message.data.b,
  asks: message.data.a,
  timestamp: message.ts,
});

export const normalizeTradeMessage = (message: v.InferOutput<typeof BybitTradeMessageSchema>): Trade[] =>
  message.data.map((trade) => ({
    id: trade.i,
    orderId: null,
    symbol: trade.s,
    side: fromBybitSide(trade.S),
    price: trade.p,
    quantity: trade.v,
    fee: null,
    feeAsset: null,
    liquidity: null,
    timestamp: trade.T,
  }));

/** The spot ticker topic carries no best bid or ask */
export const normalizeTickerMessage = (message: v.InferOutput<typeof BybitTickerMessageSchema>): Ticker => ({
  symbol: message.data.symbol,
  bid: null,
  ask: null,
  last: message.data.lastPrice,
  volume: message.data.volume24h,
  timestamp: message.ts,
});
