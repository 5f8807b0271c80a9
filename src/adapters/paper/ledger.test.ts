import { describe, expect, it } from "vitest";

import { formatDecimal, parseDecimal } from "@/lib/decimal";

import { createLedger } from "./ledger";

const d = parseDecimal;

const snapshot = (ledger: ReturnType<typeof createLedger>) =>
  ledger.balances().map((balance) => [balance.asset, formatDecimal(balance.available), formatDecimal(balance.hold)]);

describe("createLedger", () => {
  it("should move reserved funds into hold", () => {
    const ledger = createLedger({ USDT: d("1000.50") });

    expect(ledger.reserve("USDT", d("250.25"))).toBe(true);

    expect(snapshot(ledger)).toEqual([["USDT", "750.25", "250.25"]]);
  });

  it("should refuse a reservation larger than the available amount", () => {
    const ledger = createLedger({ USDT: d("100") });

    expect(ledger.reserve("USDT", d("100.01"))).toBe(false);
    expect(formatDecimal(ledger.available("USDT"))).toBe("100");
  });

  it("should settle a released hold", () => {
    const ledger = createLedger({ USDT: d("1000") });
    ledger.reserve("USDT", d("300"));

    ledger.release("USDT", d("300"));
    ledger.debit("USDT", d("290.0"));
    ledger.credit("BTC", d("0.01"));

    expect(snapshot(ledger)).toEqual([
      ["BTC", "0.01", "0"],
      ["USDT", "710", "0"],
    ]);
  });

  it("should throw when a debit exceeds the available amount", () => {
    const ledger = createLedger({ BTC: d("0.5") });

    expect(() => ledger.debit("BTC", d("0.6"))).toThrow(RangeError);
  });

  it("should leave out empty balances", () => {
    const ledger = createLedger({ BTC: d("0"), ETH: d("2") });

    expect(snapshot(ledger)).toEqual([["ETH", "2", "0"]]);
  });
});
