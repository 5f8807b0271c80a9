import { describe, expect, it } from "vitest";

import { ExchangeError } from "@/adapters/errors";

import { classifyNetworkFailure, classifyResponse, extractErrorBody, reasonFromMessage } from "./classify";

const classify = (status: number, body: unknown, headers: Record<string, string> = {}) =>
  classifyResponse({
    exchange: "binance",
    operation: "placeOrder",
    status,
    headers: new Headers(headers),
    body,
  });

describe("extractErrorBody", () => {
  it("should recognise code/msg bodies", () => {
    expect(extractErrorBody({ code: -1121, msg: "Invalid symbol." }, 400)).toEqual({
      code: "-1121",
      message: "Invalid symbol.",
    });
  });

  it("should ignore success codes", () => {
    expect(extractErrorBody({ code: 0, msg: "success" }, 200)).toBeNull();
    expect(extractErrorBody({ retCode: 0, retMsg: "OK", result: {} }, 200)).toBeNull();
  });

  it("should only read a bare message on error statuses", () => {
    expect(extractErrorBody({ message: "ok" }, 200)).toBeNull();
    expect(extractErrorBody({ message: "Not Found" }, 404)).toEqual({ message: "Not Found" });
  });

  it("should join error arrays", () => {
    expect(extractErrorBody({ error: ["EGeneral:Invalid arguments", "EOrder:Bad"] }, 200)).toEqual({
      message: "EGeneral:Invalid arguments; EOrder:Bad",
    });
    expect(extractErrorBody({ error: [] }, 200)).toBeNull();
  });

  it("should read nested error objects", () => {
    expect(extractErrorBody({ error: { code: 7, message: "bad" } }, 400)).toEqual({
      code: "7",
      message: "bad",
    });
  });
});

describe("classifyResponse", () => {
  it("should return null for a clean success", () => {
    expect(classify(200, { symbol: "BTCUSDT" })).toBeNull();
  });

  it("should map 401 and 403 to AUTH", () => {
    const error = classify(401, { code: -2015, msg: "Invalid API-key, IP, or permissions for action." });
    expect(error?.kind).toBe("AUTH");
    expect(error?.exchangeCode).toBe("-2015");
    expect(error?.retryable).toBe(false);
    expect(classify(403, null)?.kind).toBe("AUTH");
  });

  it("should map 429 to RATE_LIMITED with the Retry-After delay", () => {
    const error = classify(429, null, { "Retry-After": "3" });
    expect(error?.kind).toBe("RATE_LIMITED");
    expect(error?.retryAfterMs).toBe(3000);
    expect(error?.retryable).toBe(true);
    expect(error?.message).toBe("HTTP 429");
  });

  it("should map 418 to RATE_LIMITED without retrying", () => {
    const error = classify(418, null, { "Retry-After": "120" });
    expect(error?.kind).toBe("RATE_LIMITED");
    expect(error?.retryAfterMs).toBe(120_000);
    expect(error?.retryable).toBe(false);
  });

  it("should map 408 to a TRANSPORT error that is not retried", () => {
    const error = classify(408, null);
    expect(error?.kind).toBe("TRANSPORT");
    expect(error?.retryable).toBe(false);
  });

  it("should map 5xx to retryable TRANSPORT", () => {
    const error = classify(503, null);
    expect(error?.kind).toBe("TRANSPORT");
    expect(error?.status).toBe(503);
    expect(error?.retryable).toBe(true);
  });

  it("should map other 4xx to REJECTED with a reason from the message", () => {
    const error = classify(400, {
      code: -2010,
      msg: "Account has insufficient balance for requested action.",
    });
    expect(error?.kind).toBe("REJECTED");
    expect(error?.reason).toBe("INSUFFICIENT_BALANCE");
    expect(error?.operation).toBe("placeOrder");
  });

  it("should default the reason to UNKNOWN", () => {
    const error = classify(404, { message: "Not Found" });
    expect(error?.kind).toBe("REJECTED");
    expect(error?.reason).toBe("UNKNOWN");
  });

  it("should classify error bodies sent with 200", () => {
    const error = classify(200, { retCode: 110001, retMsg: "Order does not exist." });
    expect(error?.kind).toBe("REJECTED");
    expect(error?.reason).toBe("ORDER_NOT_FOUND");
    expect(error?.exchangeCode).toBe("110001");
  });

  it("should spot rate limiting in a 4xx message", () => {
    const error = classify(400, {
      code: -1003,
      msg: "Too many requests; current limit is 6000 request weight per 1 MINUTE.",
    });
    expect(error?.kind).toBe("RATE_LIMITED");
    expect(error?.retryable).toBe(false);
  });

  it("should keep rate-limit bodies sent with 200 retryable", () => {
    const error = classify(200, { retCode: 10006, retMsg: "Too many visits!" });
    expect(error?.kind).toBe("RATE_LIMITED");
    expect(error?.retryable).toBe(true);
  });

  it("should detect duplicates and insufficient funds in other body shapes", () => {
    expect(classify(400, { error: { message: "Duplicate clientOrderId" } })?.reason).toBe(
      "DUPLICATE_ORDER",
    );
    expect(classify(200, { error: ["EOrder:Insufficient funds"] })?.reason).toBe(
      "INSUFFICIENT_BALANCE",
    );
  });

  it("should let the adapter code table pick the kind of a 4xx but never retry it", () => {
    const error = classifyResponse({
      exchange: "binance",
      operation: "getBalances",
      status: 400,
      headers: new Headers(),
      body: { code: -1021, msg: "Timestamp for this request is outside of the recvWindow." },
      classifyBody: ({ exchange, operation, status, error: body }) =>
        body.code === "-1021"
          ? new ExchangeError("TRANSPORT", body.message, { exchange, operation, status })
          : null,
    });
    expect(error?.kind).toBe("TRANSPORT");
    expect(error?.operation).toBe("getBalances");
    expect(error?.retryable).toBe(false);
  });

  it("should treat unexpected statuses as PROTOCOL", () => {
    expect(classify(302, null)?.kind).toBe("PROTOCOL");
  });
});

describe("reasonFromMessage", () => {
  it("should match common phrasings", () => {
    expect(reasonFromMessage("Unknown order sent.")).toBe("ORDER_NOT_FOUND");
    expect(reasonFromMessage("Filter failure: LOT_SIZE")).toBe("INVALID_ORDER");
    expect(reasonFromMessage("something odd")).toBe("UNKNOWN");
  });
});

describe("classifyNetworkFailure", () => {
  const context = { exchange: "bybit", operation: "getTicker" };

  it("should wrap socket failures as TRANSPORT", () => {
    const cause = Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" });
    const error = classifyNetworkFailure(new TypeError("fetch failed", { cause }), context);
    expect(error.kind).toBe("TRANSPORT");
    expect(error.message).toBe("fetch failed (ECONNRESET)");
    expect(error.retryable).toBe(true);
  });

  it("should pass classified errors through", () => {
    const original = new ExchangeError("AUTH", "nope", context);
    expect(classifyNetworkFailure(original, context)).toBe(original);
  });
});
