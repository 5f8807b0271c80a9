/**
 * In-memory exchange for tests and dry runs.
 *
 * Orders fill completely against the last price set with `setPrice`:
 * - market orders fill at the last price
 * - limit orders fill at the last price when marketable, otherwise rest and
 *   fill at their own price once the last price crosses it
 * - stops trigger when the last price reaches the stop price; a stop without
 *   a limit price then fills at the stop price
 *
 * Fees are charged on the received asset. Client order ids are deduplicated
 * for the lifetime of the client. There is no rate limiting and no network.
 */

import * as v from "valibot";

import {
  applyOrderUpdate,
  generateClientOrderId,
  isTerminalOrderStatus,
  validateOrderLookup,
  validateOrderRequest,
} from "@/domains/order";
import { throwIfAborted } from "@/lib/async";
import { config } from "@/lib/config";
import { type Decimal, ZERO, addDecimal, multiplyDecimal, subtractDecimal } from "@/lib/decimal";
import { type Logger, logger as defaultLogger } from "@/lib/logger";
import {
  type SubscriberQueue,
  type StreamEvent,
  createSubscriberQueue,
  createSubscriptionRegistry,
} from "@/stream";

import type { StreamOptions } from "../client-options";
import { ExchangeError } from "../errors";
import {
  type ExchangeClient,
  type Market,
  type Order,
  type OrderBookSnapshot,
  type OrderLookup,
  type Page,
  type Paginator,
  type SubscriptionKey,
  type Ticker,
  type Trade,
  subscriptionKeySchema,
} from "../types";
import { createLedger } from "./ledger";
import {
  type Hold,
  buildCandles,
  isMarketable,
  isStopTriggered,
  requiredHold,
  synthesizeBook,
} from "./matching";

const DEFAULT_PAGE_LIMIT = 500;
const DEFAULT_BOOK_DEPTH = 100;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface PaperClientOptions {
  markets: Market[];
  /** Starting available balances per asset */
  balances?: Record<string, Decimal>;
  /** Starting last prices per symbol */
  prices?: Record<string, Decimal>;
  /** Fraction of the received amount kept as fee (default 0) */
  feeRate?: Decimal;
  stream?: Pick<StreamOptions, "overflowPolicy" | "subscriberBufferSize">;
  logger?: Logger;
  now?: () => Date;
}

export interface PaperClient extends ExchangeClient {
  /** Moves the last price of a symbol and fills whatever it reaches */
  setPrice(symbol: string, price: Decimal): void;
}

interface OrderEntry {
  order: Order;
  /** Released when the order leaves the book */
  hold: Hold;
  triggered: boolean;
}

type Liquidity = "MAKER" | "TAKER";

/**
 * @example
 * ```typescript
 * const paper = createPaperClient({
 *   markets: [{ symbol: "BTCUSDT", base: "BTC", quote: "USDT", basePrecision: 6, quotePrecision: 2, minQuantity: parseDecimal("0.0001") }],
 *   balances: { USDT: parseDecimal("10000") },
 *   prices: { BTCUSDT: parseDecimal("30000") },
 * });
 *
 * const order = await paper.placeOrder({ symbol: "BTCUSDT", side: "BUY", type: "MARKET", quantity: parseDecimal("0.1") });
 * ```
 */
export const createPaperClient = (options: PaperClientOptions): PaperClient => {
  const exchange = "paper";
  const log = (options.logger ?? defaultLogger).child({ exchange, component: "client" });
  const now = options.now ?? (() => new Date());
  const feeRate = options.feeRate ?? ZERO;
  const subscriberBufferSize = options.stream?.subscriberBufferSize ?? config.stream.subscriberBufferSize;
  const overflowPolicy = options.stream?.overflowPolicy ?? "drop-oldest";

  const markets = new Map(options.markets.map((market) => [market.symbol, market]));
  const prices = new Map(Object.entries(options.prices ?? {}));
  const ledger = createLedger(options.balances);

  const entries: OrderEntry[] = [];
  const byId = new Map<string, OrderEntry>();
  const byClientId = new Map<string, OrderEntry>();
  const trades: Trade[] = [];
  const bookSequences = new Map<string, number>();
  const registry = createSubscriptionRegistry<SubscriberQueue>();

  let orderSequence = 0;
  let tradeSequence = 0;
  let connected = false;

  const requireMarket = (symbol: string, operation: string): Market => {
    const market = markets.get(symbol);
    if (!market) {
      throw new ExchangeError("REJECTED", `Unknown symbol: ${symbol}`, {
        exchange,
        operation,
        reason: "INVALID_ORDER",
      });
    }
    return market;
  };

  const publish = (key: SubscriptionKey, event: StreamEvent): void => {
    for (const subscriber of registry.subscribers(key)) {
      subscriber.push(event);
    }
  };

  const restingOrders = (symbol: string): Order[] =>
    entries
      .filter(
        (entry) =>
          entry.order.symbol === symbol &&
          !isTerminalOrderStatus(entry.order.status) &&
          entry.order.price !== null &&
          (entry.order.type === "LIMIT" || entry.triggered),
      )
      .map((entry) => entry.order);

  const bookSnapshot = (symbol: string, depth?: number): OrderBookSnapshot =>
    synthesizeBook(symbol, restingOrders(symbol), bookSequences.get(symbol) ?? 0, now(), depth);

  const publishBook = (symbol: string): void => {
    bookSequences.set(symbol, (bookSequences.get(symbol) ?? 0) + 1);
    const { sequence, bids, asks, timestamp } = bookSnapshot(symbol);
    publish(
      { symbol, channel: "orderbook" },
      { type: "book", update: { symbol, sequence, isSnapshot: true, bids, asks, timestamp } },
    );
  };

  const tickerFor = (symbol: string, last: Decimal): Ticker => {
    const book = bookSnapshot(symbol, 1);
    const since = now().getTime() - DAY_MS;
    const volume = trades
      .filter((trade) => trade.symbol === symbol && trade.timestamp.getTime() > since)
      .reduce((total, trade) => addDecimal(total, trade.quantity), ZERO);
    return {
      symbol,
      bid: book.bids[0]?.price ?? null,
      ask: book.asks[0]?.price ?? null,
      last,
      volume,
      timestamp: now(),
    };
  };

  const update = (entry: OrderEntry, changes: Partial<Order>): void => {
    const result = applyOrderUpdate(entry.order, { ...entry.order, ...changes, updatedAt: now() });
    if (!result.ok) {
      throw new ExchangeError("PROTOCOL", result.error, { exchange, operation: "update" });
    }
    entry.order = result.state;
  };

  const fill = (entry: OrderEntry, price: Decimal, liquidity: Liquidity): void => {
    const { order } = entry;
    const market = requireMarket(order.symbol, "fill");
    const notional = multiplyDecimal(order.quantity, price);

    ledger.release(entry.hold.asset, entry.hold.amount);
    let fee: Decimal;
    let feeAsset: string;
    if (order.side === "BUY") {
      fee = multiplyDecimal(order.quantity, feeRate);
      feeAsset = market.base;
      ledger.debit(market.quote, notional);
      ledger.credit(market.base, subtractDecimal(order.quantity, fee));
    } else {
      fee = multiplyDecimal(notional, feeRate);
      feeAsset = market.quote;
      ledger.debit(market.base, order.quantity);
      ledger.credit(market.quote, subtractDecimal(notional, fee));
    }

    update(entry, { status: "FILLED", filledQuantity: order.quantity, averageFillPrice: price });
    const trade: Trade = {
      id: String(++tradeSequence),
      orderId: order.id,
      symbol: order.symbol,
      side: order.side,
      price,
      quantity: order.quantity,
      fee,
      feeAsset,
      liquidity,
      timestamp: entry.order.updatedAt,
    };
    trades.push(trade);
    log.info("Order filled", { orderId: order.id, symbol: order.symbol, liquidity });
    publish(
      { symbol: order.symbol, channel: "trades" },
      { type: "trade", trade: { ...trade, orderId: null, fee: null, feeAsset: null, liquidity: null } },
    );
  };

  const close = (entry: OrderEntry, status: "CANCELLED" | "EXPIRED"): void => {
    ledger.release(entry.hold.asset, entry.hold.amount);
    update(entry, { status });
  };

  /**
   * Fills or triggers an open order against the last price. Returns true when
   * the order left or joined the book.
   */
  const evaluate = (entry: OrderEntry, incoming: boolean): boolean => {
    const last = prices.get(entry.order.symbol);
    if (last === undefined || isTerminalOrderStatus(entry.order.status)) {
      return false;
    }
    const { type, side, price, stopPrice } = entry.order;
    let aggressive = incoming;

    if (type === "STOP" && !entry.triggered) {
      if (stopPrice === null || !isStopTriggered(side, stopPrice, last)) {
        return false;
      }
      entry.triggered = true;
      aggressive = true;
      if (price === null) {
        fill(entry, stopPrice, "TAKER");
        return false;
      }
    }

    if (type === "MARKET" || price === null) {
      fill(entry, last, "TAKER");
      return false;
    }
    if (isMarketable(side, price, last)) {
      const wasResting = !aggressive;
      fill(entry, aggressive ? last : price, aggressive ? "TAKER" : "MAKER");
      return wasResting;
    }
    return aggressive;
  };

  const findEntry = (lookup: OrderLookup, operation: string): OrderEntry => {
    validateOrderLookup(lookup, exchange, operation);
    const entry =
      lookup.orderId !== undefined
        ? byId.get(lookup.orderId)
        : lookup.clientOrderId !== undefined
          ? byClientId.get(lookup.clientOrderId)
          : undefined;
    if (!entry || entry.order.symbol !== lookup.symbol) {
      throw new ExchangeError("REJECTED", `Order not found: ${lookup.orderId ?? lookup.clientOrderId}`, {
        exchange,
        operation,
        reason: "ORDER_NOT_FOUND",
      });
    }
    return entry;
  };

  const cancelEntry = (entry: OrderEntry): Order => {
    const wasResting = restingOrders(entry.order.symbol).includes(entry.order);
    close(entry, "CANCELLED");
    if (wasResting) {
      publishBook(entry.order.symbol);
    }
    return entry.order;
  };

  const parseOffset = (cursor: string | undefined, operation: string): number => {
    if (cursor === undefined) return 0;
    const offset = Number(cursor);
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new ExchangeError("REJECTED", `Invalid cursor: ${cursor}`, {
        exchange,
        operation,
        reason: "INVALID_ORDER",
      });
    }
    return offset;
  };

  const paginate = <T>(
    items: readonly T[],
    timeOf: (item: T) => Date,
    paginator: Paginator,
    operation: string,
  ): Page<T> => {
    const { startTime, endTime } = paginator;
    const inRange = items.filter((item) => {
      const at = timeOf(item).getTime();
      return (
        (startTime === undefined || at >= startTime.getTime()) &&
        (endTime === undefined || at <= endTime.getTime())
      );
    });
    const offset = parseOffset(paginator.cursor, operation);
    const end = offset + (paginator.limit ?? DEFAULT_PAGE_LIMIT);
    return {
      items: inRange.slice(offset, end),
      nextCursor: end < inRange.length ? String(end) : null,
    };
  };

  const setPrice = (symbol: string, price: Decimal): void => {
    requireMarket(symbol, "setPrice");
    prices.set(symbol, price);
    publish({ symbol, channel: "ticker" }, { type: "ticker", ticker: tickerFor(symbol, price) });

    let bookChanged = false;
    for (const entry of entries.filter((candidate) => candidate.order.symbol === symbol)) {
      if (evaluate(entry, false)) {
        bookChanged = true;
      }
    }
    if (bookChanged) {
      publishBook(symbol);
    }
  };

  const subscribe: ExchangeClient["subscribe"] = (key, subscribeOptions) => {
    const parsed = v.safeParse(subscriptionKeySchema, key);
    if (!parsed.success) {
      throw new ExchangeError("REJECTED", `Invalid subscription key: ${parsed.issues[0].message}`, {
        exchange,
        operation: "subscribe",
      });
    }
    const normalized = parsed.output;
    const signal = subscribeOptions?.signal;
    const onAbort = (): void => {
      subscriber.end();
    };

    const subscriber: SubscriberQueue = createSubscriberQueue({
      capacity: subscriberBufferSize,
      policy: overflowPolicy,
      onClose: () => {
        signal?.removeEventListener("abort", onAbort);
        registry.remove(normalized, subscriber);
      },
    });

    if (signal?.aborted) {
      subscriber.end();
      return { key: normalized, unsubscribe: () => undefined, [Symbol.asyncIterator]: () => subscriber };
    }

    registry.add(normalized, subscriber);
    signal?.addEventListener("abort", onAbort, { once: true });

    // New subscribers start from the current state
    if (normalized.channel === "orderbook") {
      const { sequence, bids, asks, timestamp } = bookSnapshot(normalized.symbol);
      subscriber.push({
        type: "book",
        update: { symbol: normalized.symbol, sequence, isSnapshot: true, bids, asks, timestamp },
      });
    } else if (normalized.channel === "ticker") {
      const last = prices.get(normalized.symbol);
      if (last !== undefined) {
        subscriber.push({ type: "ticker", ticker: tickerFor(normalized.symbol, last) });
      }
    }

    return {
      key: normalized,
      unsubscribe: () => {
        subscriber.end();
      },
      [Symbol.asyncIterator]: () => subscriber,
    };
  };

  return {
    exchange,

    connect: async (requestOptions) => {
      throwIfAborted(requestOptions?.signal);
      connected = true;
      log.info("Connected", { markets: markets.size });
    },

    disconnect: async () => {
      for (const { subscribers } of registry.clear()) {
        for (const subscriber of subscribers) {
          subscriber.end();
        }
      }
      connected = false;
      log.info("Disconnected");
    },

    isConnected: () => connected,

    getMarkets: async () => [...markets.values()],

    refreshMarkets: async () => [...markets.values()],

    getOrderBook: async (symbol, depth = DEFAULT_BOOK_DEPTH) => {
      requireMarket(symbol, "getOrderBook");
      return bookSnapshot(symbol, Math.max(1, Math.trunc(depth)));
    },

    getTicker: async (symbol) => {
      requireMarket(symbol, "getTicker");
      const last = prices.get(symbol);
      if (last === undefined) {
        throw new ExchangeError("REJECTED", `No price set for ${symbol}`, {
          exchange,
          operation: "getTicker",
          reason: "INVALID_ORDER",
        });
      }
      return tickerFor(symbol, last);
    },

    getCandles: async (symbol, interval, paginator = {}) => {
      requireMarket(symbol, "getCandles");
      return buildCandles(
        symbol,
        interval,
        trades.filter((trade) => trade.symbol === symbol),
        paginator,
        DEFAULT_PAGE_LIMIT,
      );
    },

    placeOrder: async (request, requestOptions) => {
      throwIfAborted(requestOptions?.signal);
      const market = requireMarket(request.symbol, "placeOrder");
      validateOrderRequest(request, market, exchange);

      const clientOrderId = request.clientOrderId ?? generateClientOrderId();
      const existing = byClientId.get(clientOrderId);
      if (existing) {
        log.debug("Duplicate client order id", { clientOrderId, orderId: existing.order.id });
        return existing.order;
      }

      const reference =
        request.type === "MARKET"
          ? prices.get(request.symbol)
          : (request.price ?? request.stopPrice);
      if (reference === undefined) {
        throw new ExchangeError("REJECTED", `No price set for ${request.symbol}`, {
          exchange,
          operation: "placeOrder",
          reason: "INVALID_ORDER",
        });
      }

      const hold = requiredHold(market, request.side, request.quantity, reference);
      if (!ledger.reserve(hold.asset, hold.amount)) {
        throw new ExchangeError("REJECTED", `Insufficient ${hold.asset} balance`, {
          exchange,
          operation: "placeOrder",
          reason: "INSUFFICIENT_BALANCE",
        });
      }

      const createdAt = now();
      const entry: OrderEntry = {
        order: {
          id: String(++orderSequence),
          clientOrderId,
          symbol: request.symbol,
          side: request.side,
          type: request.type,
          status: "OPEN",
          quantity: request.quantity,
          filledQuantity: ZERO,
          price: request.type === "MARKET" ? null : (request.price ?? null),
          stopPrice: request.type === "STOP" ? (request.stopPrice ?? null) : null,
          averageFillPrice: null,
          createdAt,
          updatedAt: createdAt,
        },
        hold,
        triggered: false,
      };
      entries.push(entry);
      byId.set(entry.order.id, entry);
      byClientId.set(clientOrderId, entry);

      const joinedBook = evaluate(entry, true);
      const timeInForce = request.timeInForce ?? "GTC";
      if (entry.order.status === "OPEN" && entry.order.type === "LIMIT" && timeInForce !== "GTC") {
        close(entry, "EXPIRED");
      } else if (joinedBook) {
        publishBook(request.symbol);
      }

      log.info("Order accepted", { orderId: entry.order.id, status: entry.order.status });
      return entry.order;
    },

    cancelOrder: async (lookup) => {
      const entry = findEntry(lookup, "cancelOrder");
      if (isTerminalOrderStatus(entry.order.status)) {
        throw new ExchangeError("REJECTED", `Order ${entry.order.id} is ${entry.order.status}`, {
          exchange,
          operation: "cancelOrder",
          reason: "ORDER_NOT_FOUND",
        });
      }
      return cancelEntry(entry);
    },

    cancelAllOrders: async (symbol) => {
      requireMarket(symbol, "cancelAllOrders");
      return entries
        .filter((entry) => entry.order.symbol === symbol && !isTerminalOrderStatus(entry.order.status))
        .map(cancelEntry);
    },

    getOrder: async (lookup) => findEntry(lookup, "getOrder").order,

    getOpenOrders: async (symbol) =>
      entries
        .filter(
          (entry) =>
            (symbol === undefined || entry.order.symbol === symbol) &&
            !isTerminalOrderStatus(entry.order.status),
        )
        .map((entry) => entry.order),

    getOrderHistory: async (symbol, paginator = {}) =>
      paginate(
        entries.filter((entry) => entry.order.symbol === symbol).map((entry) => entry.order),
        (order) => order.createdAt,
        paginator,
        "getOrderHistory",
      ),

    getTradeHistory: async (symbol, paginator = {}) =>
      paginate(
        trades.filter((trade) => trade.symbol === symbol),
        (trade) => trade.timestamp,
        paginator,
        "getTradeHistory",
      ),

    getBalances: async () => ledger.balances(),

    subscribe,

    setPrice,
  };
};
