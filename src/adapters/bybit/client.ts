/**
 * Bybit v5 spot exchange client.
 *
 * Order placement and cancellation return ids only; placed orders are
 * reported from the request, cancelled orders are re-read.
 *
 * @see https://bybit-exchange.github.io/docs/v5/intro
 */

import type * as v from "valibot";

import { createMarketCache } from "@/domains/market";
import {
  type IdentifiedOrderRequest,
  applyOrderUpdate,
  createIdempotencyWindow,
  createOrderSubmitter,
  isTerminalOrderStatus,
  validateOrderLookup,
} from "@/domains/order";
import { config } from "@/lib/config";
import { ZERO, formatDecimal } from "@/lib/decimal";
import { type RestRequest, createRestTransport } from "@/lib/http";
import { logger as defaultLogger } from "@/lib/logger";
import { createRateLimiter } from "@/lib/rate-limiter";
import { createSigner } from "@/lib/signer";
import { createStreamManager } from "@/stream";

import { type ExchangeClientOptions, resolveIdempotencyConfig, resolveRetryPolicy } from "../client-options";
import { ExchangeError } from "../errors";
import type { ExchangeClient, Market, Order, OrderLookup, Page, Paginator, RequestOptions, Trade } from "../types";
import { classifyBybitError } from "./errors";
import {
  BYBIT_INTERVALS,
  normalizeBalances,
  normalizeCandle,
  normalizeExecution,
  normalizeMarket,
  normalizeOrder,
  normalizeOrderBook,
  normalizeTicker,
  toBybitSide,
} from "./normalizers";
import { BYBIT_RATE_LIMITS } from "./rate-limits";
import {
  BybitCancelAllSchema,
  BybitExecutionPageSchema,
  BybitInstrumentsSchema,
  BybitKlinesSchema,
  BybitOrderAckSchema,
  BybitOrderBookSchema,
  BybitOrderPageSchema,
  BybitTickersSchema,
  BybitWalletBalanceSchema,
} from "./schemas";
import { bybitSigningScheme } from "./signing";
import { createBybitStreamCodec } from "./stream-codec";

export const BYBIT_BASE_URL = "https://api.bybit.com";

const CATEGORY = "spot";

/** Largest page Bybit serves for order queries */
const ORDER_PAGE_LIMIT = 50;

export type BybitClientOptions = ExchangeClientOptions;

const toOrderBody = (request: IdentifiedOrderRequest): Record<string, string> => {
  const isLimit = request.type !== "MARKET" && request.price !== undefined;
  return {
    category: CATEGORY,
    symbol: request.symbol,
    side: toBybitSide(request.side),
    orderType: isLimit ? "Limit" : "Market",
    qty: formatDecimal(request.quantity),
    ...(isLimit && request.price !== undefined
      ? { price: formatDecimal(request.price), timeInForce: request.timeInForce ?? "GTC" }
      : { marketUnit: "baseCoin" }),
    ...(request.type === "STOP" &&
      request.stopPrice !== undefined && {
        triggerPrice: formatDecimal(request.stopPrice),
        orderFilter: "StopOrder",
      }),
    orderLinkId: request.clientOrderId,
  };
};

const toOrderIdentity = (lookup: OrderLookup): Record<string, string | undefined> => ({
  orderId: lookup.orderId,
  orderLinkId: lookup.orderId === undefined ? lookup.clientOrderId : undefined,
});

const toCursor = (nextPageCursor: string | undefined): string | null =>
  nextPageCursor === undefined || nextPageCursor === "" ? null : nextPageCursor;

/**
 * Creates a Bybit spot client on the unified trading account.
 *
 * @example
 * ```typescript
 * const bybit = createBybitClient({
 *   credentials: { exchange: "bybit", apiKey, apiSecret },
 * });
 * await bybit.connect();
 *
 * for await (const event of bybit.subscribe({ symbol: "BTCUSDT", channel: "trades" })) {
 *   if (event.type === "trade") console.log(event.trade.price);
 * }
 * ```
 */
export const createBybitClient = (options: BybitClientOptions = {}): ExchangeClient => {
  const exchange = "bybit";
  const log = (options.logger ?? defaultLogger).child({ exchange, component: "client" });

  const rateLimiter = createRateLimiter({
    exchange,
    limits: BYBIT_RATE_LIMITS,
    logger: options.logger,
  });
  const signer = options.credentials
    ? createSigner({ exchange, credentials: options.credentials, scheme: bybitSigningScheme })
    : undefined;
  const transport = createRestTransport({
    exchange,
    baseUrl: options.baseUrl ?? BYBIT_BASE_URL,
    rateLimiter,
    signer,
    retryPolicy: resolveRetryPolicy(options.retry),
    requestTimeoutMs: options.requestTimeoutMs ?? config.transport.requestTimeoutMs,
    classifyBody: classifyBybitError,
    fetch: options.fetch,
    logger: options.logger,
    random: options.random,
  });

  const send = <TSchema extends v.GenericSchema>(
    request: Omit<RestRequest<TSchema>, "signal" | "timeoutMs">,
    requestOptions: RequestOptions | undefined,
  ): Promise<v.InferOutput<TSchema>> =>
    transport.request({ ...request, signal: requestOptions?.signal, timeoutMs: requestOptions?.timeoutMs });

  const loadMarkets = async (requestOptions?: RequestOptions): Promise<Market[]> => {
    const response = await send(
      {
        operation: "getMarkets",
        method: "GET",
        path: "/v5/market/instruments-info",
        query: { category: CATEGORY },
        endpointClass: "public",
        schema: BybitInstrumentsSchema,
      },
      requestOptions,
    );
    return response.result.list.flatMap((instrument) => {
      const market = normalizeMarket(instrument);
      return market ? [market] : [];
    });
  };

  const markets = createMarketCache({
    exchange,
    load: loadMarkets,
    refreshIntervalMs: options.marketRefreshIntervalMs ?? config.markets.refreshIntervalMs,
    logger: options.logger,
  });

  const findOrder = async (
    operation: string,
    path: string,
    lookup: OrderLookup,
    requestOptions: RequestOptions | undefined,
  ): Promise<Order | null> => {
    const page = await send(
      {
        operation,
        method: "GET",
        path,
        query: { category: CATEGORY, symbol: lookup.symbol, ...toOrderIdentity(lookup) },
        endpointClass: "private",
        signed: true,
        schema: BybitOrderPageSchema,
      },
      requestOptions,
    );
    const [order] = page.result.list;
    return order ? normalizeOrder(order) : null;
  };

  /** Recent orders live in the realtime view; older ones only in history */
  const getOrder = async (lookup: OrderLookup, requestOptions?: RequestOptions): Promise<Order> => {
    validateOrderLookup(lookup, exchange, "getOrder");
    const order =
      (await findOrder("getOrder", "/v5/order/realtime", lookup, requestOptions)) ??
      (await findOrder("getOrder", "/v5/order/history", lookup, requestOptions));
    if (!order) {
      throw new ExchangeError("REJECTED", `Order not found: ${lookup.orderId ?? lookup.clientOrderId}`, {
        exchange,
        operation: "getOrder",
        reason: "ORDER_NOT_FOUND",
      });
    }
    return order;
  };

  const getOpenOrders = async (symbol?: string, requestOptions?: RequestOptions): Promise<Order[]> => {
    const orders: Order[] = [];
    let cursor: string | null = null;
    do {
      const page: v.InferOutput<typeof BybitOrderPageSchema> = await send(
        {
          operation: "getOpenOrders",
          method: "GET",
          path: "/v5/order/realtime",
          query: { category: CATEGORY, symbol, openOnly: 0, limit: ORDER_PAGE_LIMIT, cursor: cursor ?? undefined },
          endpointClass: "private",
          signed: true,
          schema: BybitOrderPageSchema,
        },
        requestOptions,
      );
      orders.push(...page.result.list.map(normalizeOrder));
      cursor = toCursor(page.result.nextPageCursor);
    } while (cursor !== null);
    return orders;
  };

  /** Applies an acknowledged cancellation to the last known state */
  const markCancelled = (order: Order, at: Date): Order => {
    if (isTerminalOrderStatus(order.status)) {
      return order;
    }
    const result = applyOrderUpdate(order, { ...order, status: "CANCELLED", updatedAt: at });
    return result.ok ? result.state : order;
  };

  const placeOrder = createOrderSubmitter({
    exchange,
    markets,
    window: createIdempotencyWindow(resolveIdempotencyConfig(options.idempotency)),
    send: async (request, requestOptions): Promise<Order> => {
      const ack = await send(
        {
          operation: "placeOrder",
          method: "POST",
          path: "/v5/order/create",
          body: toOrderBody(request),
          endpointClass: "orders",
          signed: true,
          schema: BybitOrderAckSchema,
        },
        requestOptions,
      );
      log.info("Order placed", { symbol: request.symbol, orderId: ack.result.orderId });
      const acceptedAt = new Date(ack.time);
      return {
        id: ack.result.orderId,
        clientOrderId: ack.result.orderLinkId === "" ? request.clientOrderId : ack.result.orderLinkId,
        symbol: request.symbol,
        side: request.side,
        type: request.type,
        status: "OPEN",
        quantity: request.quantity,
        filledQuantity: ZERO,
        price: request.type === "MARKET" ? null : (request.price ?? null),
        stopPrice: request.type === "STOP" ? (request.stopPrice ?? null) : null,
        averageFillPrice: null,
        createdAt: acceptedAt,
        updatedAt: acceptedAt,
      };
    },
    fetchByClientId: (symbol, clientOrderId, requestOptions) =>
      getOrder({ symbol, clientOrderId }, requestOptions),
  });

  const streams = createStreamManager({
    exchange,
    codec: createBybitStreamCodec(options.stream?.url),
    rateLimiter,
    overflowPolicy: options.stream?.overflowPolicy,
    subscriberBufferSize: options.stream?.subscriberBufferSize,
    idleTimeoutMs: options.stream?.idleTimeoutMs,
    pingIntervalMs: options.stream?.pingIntervalMs,
    maxResyncAttempts: options.stream?.maxResyncAttempts,
    reconnect: options.stream?.reconnect,
    logger: options.logger,
    random: options.random,
  });

  let connected = false;

  return {
    exchange,

    connect: async (requestOptions) => {
      const loaded = await markets.refresh(requestOptions);
      markets.start();
      connected = true;
      log.info("Connected", { markets: loaded.length, authenticated: signer !== undefined });
    },

    disconnect: async () => {
      markets.stop();
      await streams.close();
      connected = false;
      log.info("Disconnected");
    },

    isConnected: () => connected,

    getMarkets: (requestOptions) => markets.getAll(requestOptions),

    refreshMarkets: (requestOptions) => markets.refresh(requestOptions),

    getOrderBook: async (symbol, depth = 50, requestOptions) => {
      const response = await send(
        {
          operation: "getOrderBook",
          method: "GET",
          path: "/v5/market/orderbook",
          query: { category: CATEGORY, symbol, limit: Math.min(Math.max(Math.trunc(depth), 1), 200) },
          endpointClass: "public",
          schema: BybitOrderBookSchema,
        },
        requestOptions,
      );
      return normalizeOrderBook(response);
    },

    getTicker: async (symbol, requestOptions) => {
      const response = await send(
        {
          operation: "getTicker",
          method: "GET",
          path: "/v5/market/tickers",
          query: { category: CATEGORY, symbol },
          endpointClass: "public",
          schema: BybitTickersSchema,
        },
        requestOptions,
      );
      const [ticker] = response.result.list;
      if (!ticker) {
        throw new ExchangeError("REJECTED", `Unknown symbol: ${symbol}`, {
          exchange,
          operation: "getTicker",
          reason: "INVALID_ORDER",
        });
      }
      return normalizeTicker(ticker, response.time);
    },

    getCandles: async (symbol, interval, paginator: Paginator = {}, requestOptions) => {
      const response = await send(
        {
          operation: "getCandles",
          method: "GET",
          path: "/v5/market/kline",
          query: {
            category: CATEGORY,
            symbol,
            interval: BYBIT_INTERVALS[interval],
            start: paginator.startTime?.getTime(),
            end: paginator.endTime?.getTime(),
            limit: paginator.limit,
          },
          endpointClass: "public",
          schema: BybitKlinesSchema,
        },
        requestOptions,
      );
      // Newest first on the wire
      return response.result.list.map((kline) => normalizeCandle(symbol, interval, kline)).reverse();
    },

    placeOrder,

    cancelOrder: async (lookup, requestOptions) => {
      validateOrderLookup(lookup, exchange, "cancelOrder");
      const ack = await send(
        {
          operation: "cancelOrder",
          method: "POST",
          path: "/v5/order/cancel",
          body: { category: CATEGORY, symbol: lookup.symbol, ...toOrderIdentity(lookup) },
          endpointClass: "orders",
          signed: true,
          schema: BybitOrderAckSchema,
        },
        requestOptions,
      );
      const order = await getOrder({ symbol: lookup.symbol, orderId: ack.result.orderId }, requestOptions);
      return markCancelled(order, new Date(ack.time));
    },

    cancelAllOrders: async (symbol, requestOptions) => {
      const open = await getOpenOrders(symbol, requestOptions);
      const response = await send(
        {
          operation: "cancelAllOrders",
          method: "POST",
          path: "/v5/order/cancel-all",
          body: { category: CATEGORY, symbol },
          endpointClass: "orders",
          signed: true,
          schema: BybitCancelAllSchema,
        },
        requestOptions,
      );
      const cancelledIds = new Set(response.result.list.map((entry) => entry.orderId));
      const cancelledAt = new Date(response.time);
      return open
        .filter((order) => cancelledIds.has(order.id))
        .map((order) => markCancelled(order, cancelledAt));
    },

    getOrder,

    getOpenOrders,

    getOrderHistory: async (symbol, paginator: Paginator = {}, requestOptions): Promise<Page<Order>> => {
      const page = await send(
        {
          operation: "getOrderHistory",
          method: "GET",
          path: "/v5/order/history",
          query: {
            category: CATEGORY,
            symbol,
            startTime: paginator.startTime?.getTime(),
            endTime: paginator.endTime?.getTime(),
            limit: paginator.limit,
            cursor: paginator.cursor,
          },
          endpointClass: "private",
          signed: true,
          schema: BybitOrderPageSchema,
        },
        requestOptions,
      );
      return { items: page.result.list.map(normalizeOrder), nextCursor: toCursor(page.result.nextPageCursor) };
    },

    getTradeHistory: async (symbol, paginator: Paginator = {}, requestOptions): Promise<Page<Trade>> => {
      const page = await send(
        {
          operation: "getTradeHistory",
          method: "GET",
          path: "/v5/execution/list",
          query: {
            category: CATEGORY,
            symbol,
            startTime: paginator.startTime?.getTime(),
            endTime: paginator.endTime?.getTime(),
            limit: paginator.limit,
            cursor: paginator.cursor,
          },
          endpointClass: "private",
          signed: true,
          schema: BybitExecutionPageSchema,
        },
        requestOptions,
      );
      return { items: page.result.list.map(normalizeExecution), nextCursor: toCursor(page.result.nextPageCursor) };
    },

    getBalances: async (requestOptions) => {
      const wallet = await send(
        {
          operation: "getBalances",
          method: "GET",
          path: "/v5/account/wallet-balance",
          query: { accountType: "UNIFIED" },
          endpointClass: "private",
          signed: true,
          schema: BybitWalletBalanceSchema,
        },
        requestOptions,
      );
      return normalizeBalances(wallet);
    },

    subscribe: (key, subscribeOptions) => streams.subscribe(key, subscribeOptions),
  };
};
