import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_BACKOFF_CONFIG,
  RATE_LIMIT_BACKOFF_CONFIG,
  calculateBackoffMs,
  getNetworkErrorCode,
  isNetworkError,
  parseRetryAfterMs,
} from "./backoff";

describe("calculateBackoffMs", () => {
  beforeEach(() => {
    // Mock Math.random for deterministic tests
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should calculate exponential backoff", () => {
    const config = {
      initialDelayMs: 1000,
      maxDelayMs: 60000,
      multiplier: 2,
      jitterFactor: 0,
    };

    expect(calculateBackoffMs(0, config)).toBe(1000);
    expect(calculateBackoffMs(1, config)).toBe(2000);
    expect(calculateBackoffMs(2, config)).toBe(4000);
    expect(calculateBackoffMs(3, config)).toBe(8000);
  });

  it("should cap at maxDelay", () => {
    const config = {
      initialDelayMs: 1000,
      maxDelayMs: 5000,
      multiplier: 2,
      jitterFactor: 0,
    };

    expect(calculateBackoffMs(3, config)).toBe(5000);
    expect(calculateBackoffMs(10, config)).toBe(5000);
  });

  it("should add jitter", () => {
    // 250 + 250 * 0.1 * 0.5
    expect(calculateBackoffMs(0, DEFAULT_BACKOFF_CONFIG)).toBe(262);
  });

  it("should accept an injected random source", () => {
    // 1000 * 3 = 3000, plus 3000 * 0.2 * 1
    expect(calculateBackoffMs(1, RATE_LIMIT_BACKOFF_CONFIG, () => 1)).toBe(3600);
  });
});

describe("parseRetryAfterMs", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should parse seconds", () => {
    expect(parseRetryAfterMs("30")).toBe(30000);
    expect(parseRetryAfterMs("0")).toBe(0);
  });

  it("should parse HTTP dates relative to now", () => {
    expect(parseRetryAfterMs("Thu, 01 Jan 2026 00:00:05 GMT")).toBe(5000);
  });

  it("should clamp past dates to zero", () => {
    expect(parseRetryAfterMs("Wed, 31 Dec 2025 23:59:00 GMT")).toBe(0);
  });

  it("should return null for missing or garbage values", () => {
    expect(parseRetryAfterMs(null)).toBeNull();
    expect(parseRetryAfterMs(undefined)).toBeNull();
    expect(parseRetryAfterMs("soon")).toBeNull();
  });
});

describe("network errors", () => {
  it("should read the code from the error itself", () => {
    const error = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    expect(getNetworkErrorCode(error)).toBe("ECONNRESET");
    expect(isNetworkError(error)).toBe(true);
  });

  it("should read the code from a fetch failure cause", () => {
    const cause = Object.assign(new Error("connect"), { code: "UND_ERR_CONNECT_TIMEOUT" });
    const error = new TypeError("fetch failed", { cause });
    expect(getNetworkErrorCode(error)).toBe("UND_ERR_CONNECT_TIMEOUT");
    expect(isNetworkError(error)).toBe(true);
  });

  it("should not treat unrelated codes as network errors", () => {
    const error = Object.assign(new Error("boom"), { code: "ERR_INVALID_ARG_TYPE" });
    expect(isNetworkError(error)).toBe(false);
    expect(isNetworkError("nope")).toBe(false);
  });
});
