/**
 * Binance spot exchange client.
 *
 * Composes the shared rate limiter, signer, REST transport, market cache,
 * order submitter and stream manager around Binance's REST and WebSocket
 * payloads.
 *
 * @see https://developers.binance.com/docs/binance-spot-api-docs/rest-api
 */

import type * as v from "valibot";

import { createMarketCache } from "@/domains/market";
import {
  type IdentifiedOrderRequest,
  createIdempotencyWindow,
  createOrderSubmitter,
  validateOrderLookup,
} from "@/domains/order";
import { config } from "@/lib/config";
import { formatDecimal } from "@/lib/decimal";
import { type RestRequest, createRestTransport } from "@/lib/http";
import { logger as defaultLogger } from "@/lib/logger";
import { createRateLimiter } from "@/lib/rate-limiter";
import { createSigner } from "@/lib/signer";
import { createStreamManager } from "@/stream";

import { type ExchangeClientOptions, resolveIdempotencyConfig, resolveRetryPolicy } from "../client-options";
import { isRejection } from "../errors";
import type {
  ExchangeClient,
  Market,
  Order,
  OrderBookSnapshot,
  OrderLookup,
  Page,
  Paginator,
  RequestOptions,
  Trade,
} from "../types";
import { classifyBinanceError } from "./errors";
import {
  BINANCE_INTERVALS,
  normalizeAccountTrade,
  normalizeBalances,
  normalizeCandle,
  normalizeMarket,
  normalizeOrder,
  normalizeOrderBook,
  normalizeTicker,
} from "./normalizers";
import {
  BINANCE_RATE_LIMITS,
  getBinanceDepthWeight,
  getBinanceEndpointWeight,
  getBinanceOpenOrdersWeight,
} from "./rate-limits";
import {
  BinanceAccountSchema,
  BinanceAccountTradesSchema,
  BinanceCancelAllSchema,
  BinanceDepthSchema,
  BinanceExchangeInfoSchema,
  BinanceKlinesSchema,
  BinanceOrderSchema,
  BinanceOrdersSchema,
  BinanceTicker24hSchema,
} from "./schemas";
import { binanceSigningScheme } from "./signing";
import { createBinanceStreamCodec } from "./stream-codec";

export const BINANCE_BASE_URL = "https://api.binance.com";

/** Page size Binance applies when `limit` is omitted */
const DEFAULT_PAGE_LIMIT = 500;

/** Depth used for stream resynchronization snapshots */
const SNAPSHOT_DEPTH = 1000;

export type BinanceClientOptions = ExchangeClientOptions;

type OrderQuery = Record<string, string | undefined>;

const toOrderQuery = (request: IdentifiedOrderRequest): OrderQuery => {
  const type =
    request.type === "STOP"
      ? request.price === undefined
        ? "STOP_LOSS"
        : "STOP_LOSS_LIMIT"
      : request.type;
  const restsOnBook = type === "LIMIT" || type === "STOP_LOSS_LIMIT";

  return {
    symbol: request.symbol,
    side: request.side,
    type,
    timeInForce: restsOnBook ? (request.timeInForce ?? "GTC") : undefined,
    quantity: formatDecimal(request.quantity),
    price: restsOnBook && request.price !== undefined ? formatDecimal(request.price) : undefined,
    stopPrice: request.stopPrice === undefined ? undefined : formatDecimal(request.stopPrice),
    newClientOrderId: request.clientOrderId,
    newOrderRespType: "RESULT",
  };
};

/** Ids ascend; the next page starts one past the last id of a full page */
const nextIdCursor = (items: ReadonlyArray<{ id: string }>, limit: number): string | null => {
  const last = items.at(-1);
  if (!last || items.length < limit) {
    return null;
  }
  return (BigInt(last.id) + 1n).toString();
};

/**
 * Creates a Binance spot client. Without credentials only market data and
 * streams are available.
 *
 * @example
 * ```typescript
 * const binance = createBinanceClient({
 *   credentials: { exchange: "binance", apiKey, apiSecret },
 * });
 * await binance.connect();
 *
 * const order = await binance.placeOrder({
 *   symbol: "BTCUSDT",
 *   side: "BUY",
 *   type: "LIMIT",
 *   quantity: parseDecimal("0.001"),
 *   price: parseDecimal("30000"),
 * });
 * ```
 */
export const createBinanceClient = (options: BinanceClientOptions = {}): ExchangeClient => {
  const exchange = "binance";
  const log = (options.logger ?? defaultLogger).child({ exchange, component: "client" });

  const rateLimiter = createRateLimiter({
    exchange,
    limits: BINANCE_RATE_LIMITS,
    logger: options.logger,
  });
  const signer = options.credentials
    ? createSigner({ exchange, credentials: options.credentials, scheme: binanceSigningScheme })
    : undefined;
  const transport = createRestTransport({
    exchange,
    baseUrl: options.baseUrl ?? BINANCE_BASE_URL,
    rateLimiter,
    signer,
    retryPolicy: resolveRetryPolicy(options.retry),
    requestTimeoutMs: options.requestTimeoutMs ?? config.transport.requestTimeoutMs,
    classifyBody: classifyBinanceError,
    fetch: options.fetch,
    logger: options.logger,
    random: options.random,
  });

  const send = <TSchema extends v.GenericSchema>(
    request: Omit<RestRequest<TSchema>, "signal" | "timeoutMs">,
    requestOptions: RequestOptions | undefined,
  ): Promise<v.InferOutput<TSchema>> =>
    transport.request({
      weight: getBinanceEndpointWeight(request.method, request.path),
      ...request,
      signal: requestOptions?.signal,
      timeoutMs: requestOptions?.timeoutMs,
    });

  const loadMarkets = async (requestOptions?: RequestOptions): Promise<Market[]> => {
    const info = await send(
      {
        operation: "getMarkets",
        method: "GET",
        path: "/api/v3/exchangeInfo",
        endpointClass: "public",
        schema: BinanceExchangeInfoSchema,
      },
      requestOptions,
    );
    return info.symbols.flatMap((symbol) => {
      const market = normalizeMarket(symbol);
      return market ? [market] : [];
    });
  };

  const markets = createMarketCache({
    exchange,
    load: loadMarkets,
    refreshIntervalMs: options.marketRefreshIntervalMs ?? config.markets.refreshIntervalMs,
    logger: options.logger,
  });

  const getOrderBook = async (
    symbol: string,
    depth = 100,
    requestOptions?: RequestOptions,
  ): Promise<OrderBookSnapshot> => {
    const limit = Math.min(Math.max(Math.trunc(depth), 1), 5000);
    const book = await send(
      {
        operation: "getOrderBook",
        method: "GET",
        path: "/api/v3/depth",
        query: { symbol, limit },
        endpointClass: "public",
        weight: getBinanceDepthWeight(limit),
        schema: BinanceDepthSchema,
      },
      requestOptions,
    );
    return normalizeOrderBook(symbol, book, new Date());
  };

  const getOrder = async (lookup: OrderLookup, requestOptions?: RequestOptions): Promise<Order> => {
    validateOrderLookup(lookup, exchange, "getOrder");
    const order = await send(
      {
        operation: "getOrder",
        method: "GET",
        path: "/api/v3/order",
        query: {
          symbol: lookup.symbol,
          orderId: lookup.orderId,
          origClientOrderId: lookup.orderId === undefined ? lookup.clientOrderId : undefined,
        },
        endpointClass: "private",
        signed: true,
        schema: BinanceOrderSchema,
      },
      requestOptions,
    );
    return normalizeOrder(order);
  };

  const placeOrder = createOrderSubmitter({
    exchange,
    markets,
    window: createIdempotencyWindow(resolveIdempotencyConfig(options.idempotency)),
    send: async (request, requestOptions) => {
      const order = await send(
        {
          operation: "placeOrder",
          method: "POST",
          path: "/api/v3/order",
          query: toOrderQuery(request),
          endpointClass: "orders",
          signed: true,
          schema: BinanceOrderSchema,
        },
        requestOptions,
      );
      log.info("Order placed", { symbol: request.symbol, orderId: order.orderId, status: order.status });
      return normalizeOrder(order);
    },
    fetchByClientId: (symbol, clientOrderId, requestOptions) =>
      getOrder({ symbol, clientOrderId }, requestOptions),
  });

  const streams = createStreamManager({
    exchange,
    codec: createBinanceStreamCodec(options.stream?.url),
    rateLimiter,
    fetchOrderBookSnapshot: (symbol, signal) => getOrderBook(symbol, SNAPSHOT_DEPTH, { signal }),
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

    getOrderBook,

    getTicker: async (symbol, requestOptions) => {
      const ticker = await send(
        {
          operation: "getTicker",
          method: "GET",
          path: "/api/v3/ticker/24hr",
          query: { symbol },
          endpointClass: "public",
          schema: BinanceTicker24hSchema,
        },
        requestOptions,
      );
      return normalizeTicker(ticker);
    },

    getCandles: async (symbol, interval, paginator: Paginator = {}, requestOptions) => {
      const klines = await send(
        {
          operation: "getCandles",
          method: "GET",
          path: "/api/v3/klines",
          query: {
            symbol,
            interval: BINANCE_INTERVALS[interval],
            startTime: paginator.startTime?.getTime(),
            endTime: paginator.endTime?.getTime(),
            limit: paginator.limit,
          },
          endpointClass: "public",
          schema: BinanceKlinesSchema,
        },
        requestOptions,
      );
      return klines.map((kline) => normalizeCandle(symbol, interval, kline));
    },

    placeOrder,

    cancelOrder: async (lookup, requestOptions) => {
      validateOrderLookup(lookup, exchange, "cancelOrder");
      const order = await send(
        {
          operation: "cancelOrder",
          method: "DELETE",
          path: "/api/v3/order",
          query: {
            symbol: lookup.symbol,
            orderId: lookup.orderId,
            origClientOrderId: lookup.orderId === undefined ? lookup.clientOrderId : undefined,
          },
          endpointClass: "orders",
          signed: true,
          schema: BinanceOrderSchema,
        },
        requestOptions,
      );
      return normalizeOrder(order);
    },

    cancelAllOrders: async (symbol, requestOptions) => {
      try {
        const cancelled = await send(
          {
            operation: "cancelAllOrders",
            method: "DELETE",
            path: "/api/v3/openOrders",
            query: { symbol },
            endpointClass: "orders",
            signed: true,
            schema: BinanceCancelAllSchema,
          },
          requestOptions,
        );
        return cancelled.flatMap((entry) =>
          "orderReports" in entry ? entry.orderReports.map(normalizeOrder) : [normalizeOrder(entry)],
        );
      } catch (error) {
        // Binance answers "Unknown order sent." when nothing is open
        if (isRejection(error, "ORDER_NOT_FOUND")) {
          return [];
        }
        throw error;
      }
    },

    getOrder,

    getOpenOrders: async (symbol, requestOptions) => {
      const orders = await send(
        {
          operation: "getOpenOrders",
          method: "GET",
          path: "/api/v3/openOrders",
          query: { symbol },
          endpointClass: "private",
          signed: true,
          weight: getBinanceOpenOrdersWeight(symbol),
          schema: BinanceOrdersSchema,
        },
        requestOptions,
      );
      return orders.map(normalizeOrder);
    },

    getOrderHistory: async (symbol, paginator: Paginator = {}, requestOptions): Promise<Page<Order>> => {
      const limit = paginator.limit ?? DEFAULT_PAGE_LIMIT;
      const orders = await send(
        {
          operation: "getOrderHistory",
          method: "GET",
          path: "/api/v3/allOrders",
          query: {
            symbol,
            orderId: paginator.cursor,
            startTime: paginator.startTime?.getTime(),
            endTime: paginator.endTime?.getTime(),
            limit,
          },
          endpointClass: "private",
          signed: true,
          schema: BinanceOrdersSchema,
        },
        requestOptions,
      );
      const items = orders.map(normalizeOrder);
      return { items, nextCursor: nextIdCursor(items, limit) };
    },

    getTradeHistory: async (symbol, paginator: Paginator = {}, requestOptions): Promise<Page<Trade>> => {
      const limit = paginator.limit ?? DEFAULT_PAGE_LIMIT;
      const trades = await send(
        {
          operation: "getTradeHistory",
          method: "GET",
          path: "/api/v3/myTrades",
          query: {
            symbol,
            fromId: paginator.cursor,
            startTime: paginator.startTime?.getTime(),
            endTime: paginator.endTime?.getTime(),
            limit,
          },
          endpointClass: "private",
          signed: true,
          schema: BinanceAccountTradesSchema,
        },
        requestOptions,
      );
      const items = trades.map(normalizeAccountTrade);
      return { items, nextCursor: nextIdCursor(items, limit) };
    },

    getBalances: async (requestOptions) => {
      const account = await send(
        {
          operation: "getBalances",
          method: "GET",
          path: "/api/v3/account",
          endpointClass: "private",
          signed: true,
          schema: BinanceAccountSchema,
        },
        requestOptions,
      );
      return normalizeBalances(account);
    },

    subscribe: (key, subscribeOptions) => streams.subscribe(key, subscribeOptions),
  };
};
