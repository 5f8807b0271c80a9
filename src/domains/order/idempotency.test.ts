import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ExchangeError } from "@/adapters/errors";
import type { Order } from "@/adapters/types";
import { parseDecimal } from "@/lib/decimal";

import { createIdempotencyWindow, generateClientOrderId } from "./idempotency";

const createTestOrder = (id: string, clientOrderId: string | null = "client-1"): Order => ({
  id,
  clientOrderId,
  symbol: "BTCUSDT",
  side: "BUY",
  type: "MARKET",
  status: "FILLED",
  quantity: parseDecimal("0.1"),
  filledQuantity: parseDecimal("0.1"),
  price: null,
  stopPrice: null,
  averageFillPrice: parseDecimal("50000"),
  createdAt: new Date("2024-01-01T00:00:00Z"),
  updatedAt: new Date("2024-01-01T00:00:00Z"),
});

describe("createIdempotencyWindow", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should share one in-flight submission between concurrent duplicates", async () => {
    const window = createIdempotencyWindow();
    let resolvePlace: (order: Order) => void = () => {};
    const place = vi.fn(
      () =>
        new Promise<Order>((resolve) => {
          resolvePlace = resolve;
        }),
    );

    const first = window.submit("client-1", { place });
    const second = window.submit("client-1", { place });
    resolvePlace(createTestOrder("order-1"));

    const [a, b] = await Promise.all([first, second]);

    expect(place).toHaveBeenCalledTimes(1);
    expect(a.id).toBe("order-1");
    expect(b).toBe(a);
    expect(window.getStats()).toEqual({ size: 1, hits: 1, misses: 1, recovered: 0 });
  });

  it("should return the original order for a later duplicate within the ttl", async () => {
    const window = createIdempotencyWindow({ ttlMs: 1000 });
    const place = vi.fn(() => Promise.resolve(createTestOrder("order-1")));

    await window.submit("client-1", { place });
    await vi.advanceTimersByTimeAsync(500);
    const again = await window.submit("client-1", { place });

    expect(place).toHaveBeenCalledTimes(1);
    expect(again.id).toBe("order-1");
  });

  it("should submit again once the ttl has elapsed", async () => {
    const window = createIdempotencyWindow({ ttlMs: 1000 });
    const place = vi
      .fn<() => Promise<Order>>()
      .mockResolvedValueOnce(createTestOrder("order-1"))
      .mockResolvedValueOnce(createTestOrder("order-2"));

    await window.submit("client-1", { place });
    await vi.advanceTimersByTimeAsync(1001);
    const later = await window.submit("client-1", { place });

    expect(place).toHaveBeenCalledTimes(2);
    expect(later.id).toBe("order-2");
  });

  it("should evict a failed submission so the token can be retried", async () => {
    const window = createIdempotencyWindow();
    const place = vi
      .fn<() => Promise<Order>>()
      .mockRejectedValueOnce(
        new ExchangeError("TRANSPORT", "socket hang up", { exchange: "binance" }),
      )
      .mockResolvedValueOnce(createTestOrder("order-1"));

    await expect(window.submit("client-1", { place })).rejects.toThrow("socket hang up");
    const retried = await window.submit("client-1", { place });

    expect(retried.id).toBe("order-1");
    expect(place).toHaveBeenCalledTimes(2);
  });

  it("should resolve an exchange duplicate rejection to the existing order", async () => {
    const window = createIdempotencyWindow();
    const place = vi.fn(() =>
      Promise.reject(
        new ExchangeError("REJECTED", "Duplicate clientOrderId", {
          exchange: "bybit",
          reason: "DUPLICATE_ORDER",
        }),
      ),
    );
    const fetchExisting = vi.fn(() => Promise.resolve(createTestOrder("order-7")));

    const order = await window.submit("client-1", { place, fetchExisting });

    expect(order.id).toBe("order-7");
    expect(fetchExisting).toHaveBeenCalledTimes(1);
    expect(window.getStats().recovered).toBe(1);
  });

  it("should not recover other rejections", async () => {
    const window = createIdempotencyWindow();
    const place = vi.fn(() =>
      Promise.reject(
        new ExchangeError("REJECTED", "Insufficient balance", {
          exchange: "bybit",
          reason: "INSUFFICIENT_BALANCE",
        }),
      ),
    );
    const fetchExisting = vi.fn(() => Promise.resolve(createTestOrder("order-7")));

    await expect(window.submit("client-1", { place, fetchExisting })).rejects.toThrow(
      "Insufficient balance",
    );
    expect(fetchExisting).not.toHaveBeenCalled();
  });

  it("should serve remembered orders without calling the exchange", async () => {
    const window = createIdempotencyWindow();
    window.remember(createTestOrder("order-3", "client-3"));
    const place = vi.fn(() => Promise.resolve(createTestOrder("order-4", "client-3")));

    const order = await window.submit("client-3", { place });

    expect(order.id).toBe("order-3");
    expect(place).not.toHaveBeenCalled();
  });

  it("should generate tokens in the accepted alphabet", () => {
    expect(generateClientOrderId()).toMatch(/^[A-Za-z0-9_-]{1,36}$/);
  });
});
