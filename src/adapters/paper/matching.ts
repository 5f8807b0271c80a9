/**
 * Price rules of the paper exchange. Orders fill against a reference price
 * set by the caller; there is no counterparty liquidity and no partial fill.
 */

import type {
  Candle,
  CandleInterval,
  Market,
  Order,
  OrderBookSnapshot,
  OrderSide,
  Paginator,
  PriceLevel,
  Trade,
} from "@/adapters/types";
import {
  type Decimal,
  addDecimal,
  compareDecimal,
  formatDecimal,
  multiplyDecimal,
  normalizeDecimal,
} from "@/lib/decimal";

export const CANDLE_INTERVAL_MS: Record<CandleInterval, number> = {
  "1m": 60_000,
  "5m": 5 * 60_000,
  "15m": 15 * 60_000,
  "1h": 60 * 60_000,
  "4h": 4 * 60 * 60_000,
  "1d": 24 * 60 * 60_000,
};

export interface Hold {
  asset: string;
  amount: Decimal;
}

/** Funds an open order locks: quote at `price` for buys, the base quantity for sells */
export const requiredHold = (market: Market, side: OrderSide, quantity: Decimal, price: Decimal): Hold =>
  side === "BUY"
    ? { asset: market.quote, amount: normalizeDecimal(multiplyDecimal(quantity, price)) }
    : { asset: market.base, amount: quantity };

export const isStopTriggered = (side: OrderSide, stopPrice: Decimal, last: Decimal): boolean =>
  side === "BUY" ? compareDecimal(last, stopPrice) >= 0 : compareDecimal(last, stopPrice) <= 0;

export const isMarketable = (side: OrderSide, limitPrice: Decimal, last: Decimal): boolean =>
  side === "BUY" ? compareDecimal(last, limitPrice) <= 0 : compareDecimal(last, limitPrice) >= 0;

const aggregateLevels = (orders: readonly Order[], descending: boolean): PriceLevel[] => {
  const levels = new Map<string, PriceLevel>();
  for (const order of orders) {
    if (order.price === null) continue;
    const price = normalizeDecimal(order.price);
    const id = formatDecimal(price);
    const level = levels.get(id);
    levels.set(id, {
      price,
      quantity: level ? addDecimal(level.quantity, order.quantity) : order.quantity,
    });
  }
  return [...levels.values()].sort((a, b) =>
    descending ? compareDecimal(b.price, a.price) : compareDecimal(a.price, b.price),
  );
};

/**
 * Book made of the resting paper orders, aggregated by price.
 */
export const synthesizeBook = (
  symbol: string,
  resting: readonly Order[],
  sequence: number,
  timestamp: Date,
  depth?: number,
): OrderBookSnapshot => {
  const bids = aggregateLevels(
    resting.filter((order) => order.side === "BUY"),
    true,
  );
  const asks = aggregateLevels(
    resting.filter((order) => order.side === "SELL"),
    false,
  );
  return {
    symbol,
    sequence,
    bids: depth === undefined ? bids : bids.slice(0, depth),
    asks: depth === undefined ? asks : asks.slice(0, depth),
    timestamp,
  };
};

/**
 * Aggregates executions into candles, oldest first. Without a start time the
 * most recent `limit` candles are returned.
 */
export const buildCandles = (
  symbol: string,
  interval: CandleInterval,
  trades: readonly Trade[],
  paginator: Paginator,
  defaultLimit: number,
): Candle[] => {
  const width = CANDLE_INTERVAL_MS[interval];
  const candles: Candle[] = [];

  for (const trade of trades) {
    const openMs = Math.floor(trade.timestamp.getTime() / width) * width;
    const current = candles.at(-1);
    if (current && current.openTime.getTime() === openMs) {
      if (compareDecimal(trade.price, current.high) > 0) current.high = trade.price;
      if (compareDecimal(trade.price, current.low) < 0) current.low = trade.price;
      current.close = trade.price;
      current.volume = addDecimal(current.volume, trade.quantity);
      continue;
    }
    candles.push({
      symbol,
      interval,
      openTime: new Date(openMs),
      open: trade.price,
      high: trade.price,
      low: trade.price,
      close: trade.price,
      volume: trade.quantity,
    });
  }

  const { startTime, endTime } = paginator;
  const limit = paginator.limit ?? defaultLimit;
  const inRange = candles.filter(
    (candle) =>
      (startTime === undefined || candle.openTime.getTime() >= startTime.getTime()) &&
      (endTime === undefined || candle.openTime.getTime() <= endTime.getTime()),
  );
  return startTime === undefined ? inRange.slice(-limit) : inRange.slice(0, limit);
};
