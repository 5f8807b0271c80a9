/**
 * Paper account balances. Open orders move funds from `available` to `hold`;
 * fills release the hold and settle against `available`. Amounts are kept
 * normalized (`"1.50"` is stored as `"1.5"`).
 */

import type { Balance } from "@/adapters/types";
import {
  type Decimal,
  ZERO,
  addDecimal,
  compareDecimal,
  formatDecimal,
  isZeroDecimal,
  normalizeDecimal,
  subtractDecimal,
} from "@/lib/decimal";

export interface Ledger {
  available(asset: string): Decimal;
  /** Moves funds into hold; returns false (and changes nothing) when short */
  reserve(asset: string, amount: Decimal): boolean;
  release(asset: string, amount: Decimal): void;
  /** @throws RangeError when the available amount is short */
  debit(asset: string, amount: Decimal): void;
  credit(asset: string, amount: Decimal): void;
  /** Non-empty balances, sorted by asset */
  balances(): Balance[];
}

interface Account {
  available: Decimal;
  hold: Decimal;
}

export const createLedger = (initial: Record<string, Decimal> = {}): Ledger => {
  const accounts = new Map<string, Account>(
    Object.entries(initial).map(([asset, amount]) => [asset, { available: normalizeDecimal(amount), hold: ZERO }]),
  );

  const account = (asset: string): Account => {
    const existing = accounts.get(asset);
    if (existing) return existing;
    const created = { available: ZERO, hold: ZERO };
    accounts.set(asset, created);
    return created;
  };

  const debit = (asset: string, amount: Decimal): void => {
    const entry = account(asset);
    if (compareDecimal(entry.available, amount) < 0) {
      throw new RangeError(
        `Cannot debit ${formatDecimal(amount)} ${asset}; ${formatDecimal(entry.available)} available`,
      );
    }
    entry.available = normalizeDecimal(subtractDecimal(entry.available, amount));
  };

  return {
    available: (asset) => accounts.get(asset)?.available ?? ZERO,

    reserve: (asset, amount) => {
      const entry = account(asset);
      if (compareDecimal(entry.available, amount) < 0) {
        return false;
      }
      entry.available = normalizeDecimal(subtractDecimal(entry.available, amount));
      entry.hold = normalizeDecimal(addDecimal(entry.hold, amount));
      return true;
    },

    release: (asset, amount) => {
      const entry = account(asset);
      entry.hold = normalizeDecimal(subtractDecimal(entry.hold, amount));
      entry.available = normalizeDecimal(addDecimal(entry.available, amount));
    },

    debit,

    credit: (asset, amount) => {
      const entry = account(asset);
      entry.available = normalizeDecimal(addDecimal(entry.available, amount));
    },

    balances: () =>
      [...accounts.entries()]
        .filter(([, entry]) => !isZeroDecimal(entry.available) || !isZeroDecimal(entry.hold))
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([asset, entry]) => ({ asset, available: entry.available, hold: entry.hold })),
  };
};
