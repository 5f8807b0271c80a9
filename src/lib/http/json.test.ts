import { describe, expect, it } from "vitest";

import { parseJsonLossless, quoteLossyNumbers } from "./json";

describe("quoteLossyNumbers", () => {
  it("should quote numbers with a fraction or exponent", () => {
    expect(quoteLossyNumbers('{"p":0.00000001,"q":1e-8}')).toBe('{"p":"0.00000001","q":"1e-8"}');
  });

  it("should leave safe integers alone", () => {
    expect(quoteLossyNumbers('{"code":-1021,"ts":1700000000000}')).toBe(
      '{"code":-1021,"ts":1700000000000}',
    );
  });

  it("should quote integers beyond the safe range", () => {
    expect(quoteLossyNumbers("[12345678901234567890]")).toBe('["12345678901234567890"]');
  });

  it("should not touch digits inside strings", () => {
    const text = '{"msg":"price 0.5 \\"1.25\\"","n":2.5}';
    expect(quoteLossyNumbers(text)).toBe('{"msg":"price 0.5 \\"1.25\\"","n":"2.5"}');
  });
});

describe("parseJsonLossless", () => {
  it("should decode fractional numbers as their exact text", () => {
    expect(parseJsonLossless('{"price":0.00000001,"qty":"1.50","id":7}')).toEqual({
      price: "0.00000001",
      qty: "1.50",
      id: 7,
    });
  });

  it("should decode nested arrays", () => {
    expect(parseJsonLossless('{"bids":[[100.5,2]],"ok":true,"x":null}')).toEqual({
      bids: [["100.5", 2]],
      ok: true,
      x: null,
    });
  });

  it("should throw on malformed documents", () => {
    expect(() => parseJsonLossless("<html>")).toThrow(SyntaxError);
  });
});
