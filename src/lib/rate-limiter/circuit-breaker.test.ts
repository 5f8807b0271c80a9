import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ExchangeError } from "@/adapters/errors";

import { createCircuitBreaker } from "./circuit-breaker";

const transportFailure = async (): Promise<string> => {
  throw new ExchangeError("TRANSPORT", "failure", { exchange: "binance" });
};

const rejection = async (): Promise<string> => {
  throw new ExchangeError("REJECTED", "insufficient balance", {
    exchange: "binance",
    reason: "INSUFFICIENT_BALANCE",
  });
};

const openError = (error: unknown): boolean =>
  error instanceof ExchangeError && error.kind === "TRANSPORT" && !error.retryable;

describe("createCircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("initial state", () => {
    it("should start in CLOSED state", () => {
      const breaker = createCircuitBreaker("binance");
      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.isOpen()).toBe(false);
    });
  });

  describe("execute", () => {
    it("should execute successful functions", async () => {
      const breaker = createCircuitBreaker("binance");
      const result = await breaker.execute(async () => "success");
      expect(result).toBe("success");
    });

    it("should pass an abort signal to the function", async () => {
      const breaker = createCircuitBreaker("binance");
      const result = await breaker.execute(async (signal) => signal instanceof AbortSignal);
      expect(result).toBe(true);
    });
  });

  describe("circuit opening", () => {
    it("should open after consecutive transport failures", async () => {
      const breaker = createCircuitBreaker("binance", {
        failureThreshold: 3,
        resetTimeoutMs: 30000,
      });

      for (let i = 0; i < 3; i++) {
        await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      }

      const error = await breaker.execute(transportFailure).catch((caught: unknown) => caught);
      expect(openError(error)).toBe(true);
      expect(breaker.getState()).toBe("OPEN");
      expect(breaker.isOpen()).toBe(true);
    });

    it("should not count rejections or plain errors", async () => {
      const breaker = createCircuitBreaker("binance", {
        failureThreshold: 2,
        resetTimeoutMs: 30000,
      });

      for (let i = 0; i < 5; i++) {
        await expect(breaker.execute(rejection)).rejects.toThrow("insufficient balance");
      }
      await expect(
        breaker.execute(async () => {
          throw new Error("bug");
        }),
      ).rejects.toThrow("bug");

      expect(breaker.getState()).toBe("CLOSED");
    });

    it("should reset failure count on success", async () => {
      const breaker = createCircuitBreaker("binance", {
        failureThreshold: 3,
        resetTimeoutMs: 30000,
      });

      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await breaker.execute(async () => "success");
      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");

      expect(breaker.getState()).toBe("CLOSED");
    });
  });

  describe("circuit recovery", () => {
    it("should close after a successful test call", async () => {
      const breaker = createCircuitBreaker("binance", {
        failureThreshold: 2,
        resetTimeoutMs: 1000,
      });

      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      expect(breaker.getState()).toBe("OPEN");

      await vi.advanceTimersByTimeAsync(1000);

      await expect(breaker.execute(async () => "success")).resolves.toBe("success");
      expect(breaker.getState()).toBe("CLOSED");
    });

    it("should return to OPEN on failure in HALF_OPEN", async () => {
      const breaker = createCircuitBreaker("binance", {
        failureThreshold: 2,
        resetTimeoutMs: 1000,
      });

      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await vi.advanceTimersByTimeAsync(1000);

      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");

      const error = await breaker.execute(async () => "success").catch((caught: unknown) => caught);
      expect(openError(error)).toBe(true);
    });
  });

  describe("state change events", () => {
    it("should notify on state changes", async () => {
      const breaker = createCircuitBreaker("bybit", {
        failureThreshold: 2,
        resetTimeoutMs: 1000,
      });

      const stateChanges: string[] = [];
      breaker.onStateChange((state) => {
        stateChanges.push(state);
      });

      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");

      expect(stateChanges).toEqual(["OPEN"]);
    });

    it("should allow unsubscribing", async () => {
      const breaker = createCircuitBreaker("bybit", {
        failureThreshold: 2,
        resetTimeoutMs: 1000,
      });

      const stateChanges: string[] = [];
      const unsubscribe = breaker.onStateChange((state) => {
        stateChanges.push(state);
      });
      unsubscribe();

      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");
      await expect(breaker.execute(transportFailure)).rejects.toThrow("failure");

      expect(stateChanges).toHaveLength(0);
    });
  });
});
