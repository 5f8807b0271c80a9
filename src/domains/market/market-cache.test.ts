import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ExchangeError } from "@/adapters/errors";
import type { Market } from "@/adapters/types";
import { parseDecimal } from "@/lib/decimal";
import { createLogger } from "@/lib/logger";

import { createMarketCache } from "./market-cache";

const btc: Market = {
  symbol: "BTCUSDT",
  base: "BTC",
  quote: "USDT",
  basePrecision: 5,
  quotePrecision: 2,
  minQuantity: parseDecimal("0.00001"),
};

const eth: Market = { ...btc, symbol: "ETHUSDT", base: "ETH", basePrecision: 4 };

const silent = createLogger({ level: "error" });

describe("createMarketCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should load once on first use", async () => {
    const load = vi.fn(() => Promise.resolve([btc, eth]));
    const cache = createMarketCache({ exchange: "binance", load, logger: silent });

    const market = await cache.get("ETHUSDT");
    const all = await cache.getAll();

    expect(market.basePrecision).toBe(4);
    expect(all.map((m) => m.symbol)).toEqual(["BTCUSDT", "ETHUSDT"]);
    expect(load).toHaveBeenCalledTimes(1);
    expect(cache.isLoaded()).toBe(true);
  });

  it("should share one request between concurrent refreshes", async () => {
    const load = vi.fn(() => Promise.resolve([btc]));
    const cache = createMarketCache({ exchange: "binance", load, logger: silent });

    await Promise.all([cache.refresh(), cache.refresh(), cache.get("BTCUSDT")]);

    expect(load).toHaveBeenCalledTimes(1);
  });

  it("should reject unknown symbols as invalid orders", async () => {
    const cache = createMarketCache({
      exchange: "bybit",
      load: () => Promise.resolve([btc]),
      logger: silent,
    });

    const error = await cache.get("DOGEUSDT").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExchangeError);
    if (error instanceof ExchangeError) {
      expect(error.kind).toBe("REJECTED");
      expect(error.reason).toBe("INVALID_ORDER");
      expect(error.message).toBe("Unknown symbol: DOGEUSDT");
    }
  });

  it("should replace the market set on periodic refresh", async () => {
    const load = vi
      .fn<() => Promise<Market[]>>()
      .mockResolvedValueOnce([btc])
      .mockResolvedValueOnce([btc, eth]);
    const cache = createMarketCache({
      exchange: "binance",
      load,
      refreshIntervalMs: 1000,
      logger: silent,
    });

    await cache.getAll();
    cache.start();
    await vi.advanceTimersByTimeAsync(1000);
    cache.stop();

    expect((await cache.getAll()).map((m) => m.symbol)).toEqual(["BTCUSDT", "ETHUSDT"]);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("should keep the previous markets when a periodic refresh fails", async () => {
    const load = vi
      .fn<() => Promise<Market[]>>()
      .mockResolvedValueOnce([btc])
      .mockRejectedValueOnce(new Error("boom"));
    const cache = createMarketCache({
      exchange: "binance",
      load,
      refreshIntervalMs: 1000,
      logger: silent,
    });

    await cache.getAll();
    cache.start();
    await vi.advanceTimersByTimeAsync(1000);
    cache.stop();

    expect((await cache.get("BTCUSDT")).symbol).toBe("BTCUSDT");
  });
});
