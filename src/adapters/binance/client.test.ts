import { describe, expect, it, vi } from "vitest";

import type { Credentials } from "@/adapters/types";
import { formatDecimal, parseDecimal } from "@/lib/decimal";
import type { FetchFn } from "@/lib/http";
import { createLogger } from "@/lib/logger";

import { createBinanceClient } from "./client";

const silent = createLogger({ level: "error" });

const credentials: Credentials = { exchange: "binance", apiKey: "test-key", apiSecret: "test-secret" };

type Route = (url: URL) => { status?: number; body: unknown };

interface RecordedCall {
  method: string;
  url: URL;
  init: RequestInit;
}

const exchangeInfo = {
  symbols: [
    {
      symbol: "BTCUSDT",
      status: "TRADING",
      baseAsset: "BTC",
      quoteAsset: "USDT",
      baseAssetPrecision: 8,
      quoteAssetPrecision: 8,
      filters: [
        { filterType: "PRICE_FILTER", tickSize: "0.01000000" },
        { filterType: "LOT_SIZE", minQty: "0.00001000", stepSize: "0.00001000" },
      ],
    },
    {
      symbol: "ETHBTC",
      status: "BREAK",
      baseAsset: "ETH",
      quoteAsset: "BTC",
      baseAssetPrecision: 8,
      quoteAssetPrecision: 8,
      filters: [],
    },
  ],
};

const binanceOrder = (overrides: Record<string, unknown> = {}) => ({
  symbol: "BTCUSDT",
  orderId: 12345,
  clientOrderId: "client-1",
  price: "30000.25000000",
  origQty: "0.50000000",
  executedQty: "0.00000000",
  cummulativeQuoteQty: "0.00000000",
  status: "NEW",
  timeInForce: "GTC",
  type: "LIMIT",
  side: "BUY",
  transactTime: 1700000000000,
  ...overrides,
});

const createStub = (routes: Record<string, Route>) => {
  const calls: RecordedCall[] = [];
  const fetch = vi.fn<FetchFn>((input, init) => {
    const url = new URL(input);
    const method = init.method ?? "GET";
    calls.push({ method, url, init });
    const route = routes[`${method} ${url.pathname}`] ?? routes[url.pathname];
    const reply = route ? route(url) : { status: 404, body: { code: -1, msg: "No route" } };
    return Promise.resolve(new Response(JSON.stringify(reply.body), { status: reply.status ?? 200 }));
  });
  return { fetch, calls };
};

const setup = (routes: Record<string, Route>, withCredentials = true) => {
  const stub = createStub({ "/api/v3/exchangeInfo": () => ({ body: exchangeInfo }), ...routes });
  const client = createBinanceClient({
    ...(withCredentials && { credentials }),
    fetch: stub.fetch,
    logger: silent,
  });
  return { client, ...stub };
};

const limitOrder = {
  symbol: "BTCUSDT",
  side: "BUY",
  type: "LIMIT",
  quantity: parseDecimal("0.5"),
  price: parseDecimal("30000.25"),
  clientOrderId: "client-1",
} as const;

describe("createBinanceClient", () => {
  describe("connection", () => {
    it("should load trading markets on connect", async () => {
      const { client } = setup({});

      await client.connect();
      const markets = await client.getMarkets();
      await client.disconnect();

      expect(markets.map((market) => market.symbol)).toEqual(["BTCUSDT"]);
      expect(markets[0]).toMatchObject({ basePrecision: 5, quotePrecision: 2 });
      expect(client.isConnected()).toBe(false);
    });
  });

  describe("market data", () => {
    it("should request the depth limit and keep the snapshot sequence", async () => {
      const { client, calls } = setup({
        "/api/v3/depth": () => ({
          body: {
            lastUpdateId: 1027024,
            bids: [
              ["30000.10", "1.0"],
              ["30000.00", "2.0"],
            ],
            asks: [["30000.20", "0.5"]],
          },
        }),
      });

      const book = await client.getOrderBook("BTCUSDT", 5);

      expect(calls[0]?.url.search).toBe("?symbol=BTCUSDT&limit=5");
      expect(book.sequence).toBe(1027024);
      expect(book.bids.map((level) => formatDecimal(level.price))).toEqual(["30000.10", "30000.00"]);
    });

    it("should map candle intervals and time bounds", async () => {
      const { client, calls } = setup({
        "/api/v3/klines": () => ({
          body: [[1700000000000, "1.0", "2.0", "0.5", "1.5", "100", 1700000059999, "150", 10, "50", "75", "0"]],
        }),
      });

      const candles = await client.getCandles("BTCUSDT", "1h", {
        startTime: new Date(1700000000000),
        limit: 1,
      });

      expect(calls[0]?.url.search).toBe("?symbol=BTCUSDT&interval=1h&startTime=1700000000000&limit=1");
      expect(candles).toHaveLength(1);
      expect(candles[0]?.openTime).toEqual(new Date(1700000000000));
      expect(candles[0] && formatDecimal(candles[0].close)).toBe("1.5");
    });
  });

  describe("placeOrder", () => {
    it("should sign the order and normalize the response", async () => {
      const { client, calls } = setup({
        "POST /api/v3/order": () => ({ body: binanceOrder() }),
      });

      const order = await client.placeOrder(limitOrder);

      const post = calls.find((call) => call.method === "POST");
      expect(post?.url.pathname).toBe("/api/v3/order");
      expect([...(post?.url.searchParams.keys() ?? [])]).toEqual([
        "symbol",
        "side",
        "type",
        "timeInForce",
        "quantity",
        "price",
        "newClientOrderId",
        "newOrderRespType",
        "recvWindow",
        "timestamp",
        "signature",
      ]);
      expect(post?.url.searchParams.get("price")).toBe("30000.25");
      expect(post?.init.headers).toMatchObject({ "X-MBX-APIKEY": "test-key" });
      expect(order).toMatchObject({ id: "12345", clientOrderId: "client-1", status: "OPEN", type: "LIMIT" });
    });

    it("should send a stop without a limit price as STOP_LOSS", async () => {
      const { client, calls } = setup({
        "POST /api/v3/order": (url) => ({
          body: binanceOrder({
            clientOrderId: url.searchParams.get("newClientOrderId"),
            type: "STOP_LOSS",
            price: "0.00000000",
            stopPrice: "29000.00000000",
          }),
        }),
      });

      const order = await client.placeOrder({
        symbol: "BTCUSDT",
        side: "SELL",
        type: "STOP",
        quantity: parseDecimal("0.5"),
        stopPrice: parseDecimal("29000"),
        clientOrderId: "stop-1",
      });

      const params = calls.find((call) => call.method === "POST")?.url.searchParams;
      expect(params?.get("type")).toBe("STOP_LOSS");
      expect(params?.get("stopPrice")).toBe("29000");
      expect(params?.has("timeInForce")).toBe(false);
      expect(params?.has("price")).toBe(false);
      expect(order.type).toBe("STOP");
      expect(order.clientOrderId).toBe("stop-1");
    });

    it("should reject an order off the market's precision without calling the exchange", async () => {
      const { client, calls } = setup({});

      await expect(client.placeOrder({ ...limitOrder, price: parseDecimal("30000.255") })).rejects.toMatchObject({
        kind: "REJECTED",
        reason: "INVALID_ORDER",
      });
      expect(calls.map((call) => call.url.pathname)).toEqual(["/api/v3/exchangeInfo"]);
    });

    it("should recover the existing order after a duplicate rejection", async () => {
      const { client, calls } = setup({
        "POST /api/v3/order": () => ({ status: 400, body: { code: -2010, msg: "Duplicate order sent." } }),
        "GET /api/v3/order": () => ({ body: binanceOrder({ orderId: 777 }) }),
      });

      const order = await client.placeOrder(limitOrder);

      const lookup = calls.find((call) => call.method === "GET" && call.url.pathname === "/api/v3/order");
      expect(lookup?.url.searchParams.get("origClientOrderId")).toBe("client-1");
      expect(lookup?.url.searchParams.has("orderId")).toBe(false);
      expect(order.id).toBe("777");
    });

    it("should surface insufficient balance rejections", async () => {
      const { client } = setup({
        "POST /api/v3/order": () => ({
          status: 400,
          body: { code: -2010, msg: "Account has insufficient balance for requested action." },
        }),
      });

      await expect(client.placeOrder(limitOrder)).rejects.toMatchObject({
        kind: "REJECTED",
        reason: "INSUFFICIENT_BALANCE",
        operation: "placeOrder",
        attempts: 1,
      });
    });
  });

  describe("order management", () => {
    it("should require an order or client id to cancel", async () => {
      const { client, calls } = setup({});

      await expect(client.cancelOrder({ symbol: "BTCUSDT" })).rejects.toMatchObject({
        kind: "REJECTED",
        reason: "INVALID_ORDER",
      });
      expect(calls).toHaveLength(0);
    });

    it("should flatten order lists when cancelling everything", async () => {
      const { client } = setup({
        "DELETE /api/v3/openOrders": () => ({
          body: [
            binanceOrder({ orderId: 1, status: "CANCELED" }),
            {
              orderListId: 9,
              contingencyType: "OCO",
              orderReports: [
                binanceOrder({ orderId: 2, status: "CANCELED", type: "STOP_LOSS_LIMIT" }),
                binanceOrder({ orderId: 3, status: "CANCELED", type: "LIMIT_MAKER" }),
              ],
            },
          ],
        }),
      });

      const cancelled = await client.cancelAllOrders("BTCUSDT");

      expect(cancelled.map((order) => [order.id, order.type, order.status])).toEqual([
        ["1", "LIMIT", "CANCELLED"],
        ["2", "STOP", "CANCELLED"],
        ["3", "LIMIT", "CANCELLED"],
      ]);
    });

    it("should return nothing when no order is open to cancel", async () => {
      const { client } = setup({
        "DELETE /api/v3/openOrders": () => ({ status: 400, body: { code: -2011, msg: "Unknown order sent." } }),
      });

      await expect(client.cancelAllOrders("BTCUSDT")).resolves.toEqual([]);
    });

    it("should page through order history by order id", async () => {
      const { client, calls } = setup({
        "/api/v3/allOrders": (url) => ({
          body:
            url.searchParams.get("orderId") === "12"
              ? [binanceOrder({ orderId: 12 })]
              : [binanceOrder({ orderId: 10 }), binanceOrder({ orderId: 11 })],
        }),
      });

      const first = await client.getOrderHistory("BTCUSDT", { limit: 2 });
      const second = await client.getOrderHistory("BTCUSDT", { limit: 2, cursor: first.nextCursor ?? undefined });

      expect(first.items.map((order) => order.id)).toEqual(["10", "11"]);
      expect(first.nextCursor).toBe("12");
      expect(second.items.map((order) => order.id)).toEqual(["12"]);
      expect(second.nextCursor).toBeNull();
      expect(calls[1]?.url.searchParams.get("orderId")).toBe("12");
    });
  });

  describe("account", () => {
    it("should fail private calls without credentials before any request", async () => {
      const { client, fetch } = setup({}, false);

      await expect(client.getBalances()).rejects.toMatchObject({ kind: "AUTH" });
      expect(fetch).not.toHaveBeenCalled();
    });

    it("should return non-empty balances", async () => {
      const { client } = setup({
        "/api/v3/account": () => ({
          body: {
            balances: [
              { asset: "BTC", free: "0.5", locked: "0.1" },
              { asset: "ETH", free: "0.00000000", locked: "0.00000000" },
            ],
          },
        }),
      });

      const balances = await client.getBalances();

      expect(balances).toHaveLength(1);
      expect(balances[0]?.asset).toBe("BTC");
      expect(balances[0] && formatDecimal(balances[0].available)).toBe("0.5");
    });
  });
});
