import { describe, expect, it } from "vitest";

import { binanceSigningScheme } from "@/adapters/binance/signing";
import { bybitSigningScheme } from "@/adapters/bybit/signing";
import { ExchangeError } from "@/adapters/errors";
import type { Credentials } from "@/adapters/types";

import { type SignableRequest, createSigner, encodeQuery, hmacSha256Hex } from "./signer";

const binanceCredentials: Credentials = {
  exchange: "binance",
  apiKey: "test-key",
  apiSecret: "test-secret",
};

const bybitCredentials: Credentials = {
  exchange: "bybit",
  apiKey: "test-key",
  apiSecret: "test-secret",
};

const orderRequest: SignableRequest = {
  method: "POST",
  path: "/api/v3/order",
  query: [
    ["symbol", "BTCUSDT"],
    ["side", "BUY"],
    ["type", "LIMIT"],
    ["timeInForce", "GTC"],
    ["quantity", "0.5"],
    ["price", "30000.10"],
  ],
};

describe("hmacSha256Hex", () => {
  it("should produce a hex digest", () => {
    expect(hmacSha256Hex("test-secret", "payload")).toBe(
      "2fcd0dbc44d5dd073ead5ea4b4d81cfd543e5de42e9c353f80452715e2b576a3",
    );
  });
});

describe("encodeQuery", () => {
  it("should keep parameter order and percent-encode values", () => {
    expect(
      encodeQuery([
        ["b", "2"],
        ["a", "x y"],
      ]),
    ).toBe("b=2&a=x%20y");
  });
});

describe("createSigner", () => {
  describe("determinism", () => {
    it("should produce identical output for identical inputs and timestamp", () => {
      const signer = createSigner({
        exchange: "binance",
        credentials: binanceCredentials,
        scheme: binanceSigningScheme,
      });

      const first = signer.sign(orderRequest, { timestamp: 1700000000000 });
      const second = signer.sign(orderRequest, { timestamp: 1700000000000 });

      expect(second).toEqual(first);
    });

    it("should sign the same Binance request differently at another timestamp", () => {
      const signer = createSigner({
        exchange: "binance",
        credentials: binanceCredentials,
        scheme: binanceSigningScheme,
      });
      const signatureAt = (timestamp: number): string | null =>
        new URLSearchParams(signer.sign(orderRequest, { timestamp }).queryString).get("signature");

      const first = signatureAt(1700000000000);
      const second = signatureAt(1700000000001);

      expect(first).toMatch(/^[0-9a-f]{64}$/);
      expect(second).toMatch(/^[0-9a-f]{64}$/);
      expect(second).not.toBe(first);
    });

    it("should sign the same Bybit request differently at another timestamp", () => {
      const signer = createSigner({
        exchange: "bybit",
        credentials: bybitCredentials,
        scheme: bybitSigningScheme,
      });
      const signatureAt = (timestamp: number): string | undefined =>
        signer.sign(orderRequest, { timestamp }).headers["X-BAPI-SIGN"];

      const first = signatureAt(1700000000000);
      const second = signatureAt(1700000000001);

      expect(first).toMatch(/^[0-9a-f]{64}$/);
      expect(second).toMatch(/^[0-9a-f]{64}$/);
      expect(second).not.toBe(first);
    });
  });

  describe("replay resistance", () => {
    it("should issue strictly increasing timestamps when the clock stands still", () => {
      const signer = createSigner({
        exchange: "binance",
        credentials: binanceCredentials,
        scheme: binanceSigningScheme,
        clock: () => 1000,
      });

      const timestamps = [1, 2, 3].map(() => signer.sign(orderRequest).timestamp);

      expect(timestamps).toEqual([1000, 1001, 1002]);
    });

    it("should not go backwards when the clock does", () => {
      const readings = [2000, 1500, 2500];
      const signer = createSigner({
        exchange: "binance",
        credentials: binanceCredentials,
        scheme: binanceSigningScheme,
        clock: () => readings.shift() ?? 0,
      });

      expect(signer.sign(orderRequest).timestamp).toBe(2000);
      expect(signer.sign(orderRequest).timestamp).toBe(2001);
      expect(signer.sign(orderRequest).timestamp).toBe(2500);
    });

    it("should advance the counter exactly once per signed request", () => {
      const signer = createSigner({
        exchange: "bybit",
        credentials: bybitCredentials,
        scheme: bybitSigningScheme,
        clock: () => 5,
      });

      signer.sign({ method: "GET", path: "/v5/account/wallet-balance", query: [] });
      signer.sign({ method: "GET", path: "/v5/account/wallet-balance", query: [] }, { timestamp: 9 });

      expect(signer.getSignedCount()).toBe(2);
    });
  });

  describe("credential validation", () => {
    it("should reject empty keys with a fatal AUTH error", () => {
      const create = () =>
        createSigner({
          exchange: "binance",
          credentials: { ...binanceCredentials, apiKey: "" },
          scheme: binanceSigningScheme,
        });

      expect(create).toThrow(ExchangeError);
      expect(create).toThrow("Malformed credentials: apiKey");
    });

    it("should reject secrets containing whitespace", () => {
      try {
        createSigner({
          exchange: "binance",
          credentials: { ...binanceCredentials, apiSecret: "test-secret\n" },
          scheme: binanceSigningScheme,
        });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ExchangeError);
        if (error instanceof ExchangeError) {
          expect(error.kind).toBe("AUTH");
          expect(error.retryable).toBe(false);
        }
      }
    });

    it("should reject credentials issued for another exchange", () => {
      expect(() =>
        createSigner({
          exchange: "bybit",
          credentials: binanceCredentials,
          scheme: bybitSigningScheme,
        }),
      ).toThrow("Credentials for binance cannot sign bybit requests");
    });
  });
});

describe("binanceSigningScheme", () => {
  it("should append recvWindow, timestamp and the signature", () => {
    const signer = createSigner({
      exchange: "binance",
      credentials: binanceCredentials,
      scheme: binanceSigningScheme,
    });

    const signed = signer.sign(orderRequest, { timestamp: 1700000000000 });

    expect(signed.queryString).toBe(
      "symbol=BTCUSDT&side=BUY&type=LIMIT&timeInForce=GTC&quantity=0.5&price=30000.10" +
        "&recvWindow=5000&timestamp=1700000000000" +
        "&signature=f16e2206daf37e9d69855f90ceb8b5c3dc89719d8ebb92e1d680b1d1bf0263d4",
    );
    expect(signed.headers).toEqual({ "X-MBX-APIKEY": "test-key" });
  });

  it("should sign requests without parameters", () => {
    const signer = createSigner({
      exchange: "binance",
      credentials: binanceCredentials,
      scheme: binanceSigningScheme,
    });

    const signed = signer.sign(
      { method: "GET", path: "/api/v3/account", query: [] },
      { timestamp: 1700000000000 },
    );

    expect(signed.queryString).toBe(
      "recvWindow=5000&timestamp=1700000000000" +
        "&signature=e80444d3300edcb80b05d266439eb51c0f9551b00a09836c26b05dea9af0eba3",
    );
  });
});

describe("bybitSigningScheme", () => {
  const signer = createSigner({
    exchange: "bybit",
    credentials: bybitCredentials,
    scheme: bybitSigningScheme,
  });

  it("should sign the query string of GET requests", () => {
    const signed = signer.sign(
      {
        method: "GET",
        path: "/v5/order/realtime",
        query: [
          ["category", "spot"],
          ["symbol", "BTCUSDT"],
        ],
      },
      { timestamp: 1700000000000 },
    );

    expect(signed.queryString).toBe("category=spot&symbol=BTCUSDT");
    expect(signed.headers).toEqual({
      "X-BAPI-API-KEY": "test-key",
      "X-BAPI-TIMESTAMP": "1700000000000",
      "X-BAPI-RECV-WINDOW": "5000",
      "X-BAPI-SIGN": "0048edf42c4979197cec265d4f090ffe6c30d7dec8782e4e6a26b51c2703cbf9",
    });
  });

  it("should sign the body of POST requests", () => {
    const signed = signer.sign(
      {
        method: "POST",
        path: "/v5/order/cancel-all",
        query: [],
        body: '{"category":"spot","symbol":"BTCUSDT"}',
      },
      { timestamp: 1700000000000 },
    );

    expect(signed.headers["X-BAPI-SIGN"]).toBe(
      "868f480146ca9f2565a028497580cd3645e1cbc04b4f14225b95f7d912688073",
    );
    expect(signed.body).toBe('{"category":"spot","symbol":"BTCUSDT"}');
  });
});
