import { describe, expect, it, vi } from "vitest";

import { formatDecimal, parseDecimal } from "@/lib/decimal";
import type { FetchFn } from "@/lib/http";
import { createLogger } from "@/lib/logger";

import { parseClientConfig } from "./config";
import { createExchangeClient } from "./factory";

const silent = createLogger({ level: "error" });

describe("createExchangeClient", () => {
  it("should build a Binance client that sends through the injected fetch", async () => {
    const fetch = vi.fn<FetchFn>(() =>
      Promise.resolve(new Response(JSON.stringify({ balances: [{ asset: "BTC", free: "0.5", locked: "0" }] }))),
    );
    const client = createExchangeClient(
      parseClientConfig({
        exchange: "binance",
        apiKey: "test-key",
        apiSecret: "test-secret",
        baseUrl: "https://binance.test",
      }),
      { logger: silent, fetch },
    );

    const balances = await client.getBalances();

    expect(client.exchange).toBe("binance");
    expect(new URL(fetch.mock.calls[0]?.[0] ?? "").origin).toBe("https://binance.test");
    expect(balances.map((balance) => balance.asset)).toEqual(["BTC"]);
  });

  it("should build a market-data-only Bybit client without credentials", async () => {
    const fetch = vi.fn<FetchFn>();
    const client = createExchangeClient(parseClientConfig({ exchange: "bybit" }), { logger: silent, fetch });

    expect(client.exchange).toBe("bybit");
    await expect(client.getBalances()).rejects.toMatchObject({ kind: "AUTH" });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("should build a paper client from decimal strings", async () => {
    const client = createExchangeClient(
      parseClientConfig({
        exchange: "paper",
        markets: [
          { symbol: "BTCUSDT", base: "BTC", quote: "USDT", basePrecision: 6, quotePrecision: 2, minQuantity: "0.0001" },
        ],
        balances: { USDT: "1000" },
        prices: { BTCUSDT: "25000" },
      }),
      { logger: silent },
    );

    const order = await client.placeOrder({
      symbol: "BTCUSDT",
      side: "BUY",
      type: "MARKET",
      quantity: parseDecimal("0.01"),
    });

    expect(client.exchange).toBe("paper");
    expect(order.status).toBe("FILLED");
    const usdt = (await client.getBalances()).find((balance) => balance.asset === "USDT");
    expect(usdt && formatDecimal(usdt.available)).toBe("750");
  });
});
