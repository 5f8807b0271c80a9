/**
 * Pre-flight checks of an order request against its market. Runs before any
 * I/O so a malformed order never costs a rate-limit token.
 */

import * as v from "valibot";

import { ExchangeError } from "@/adapters/errors";
import { type Market, type OrderLookup, type OrderRequest, orderRequestSchema } from "@/adapters/types";
import { compareDecimal, decimalScale, formatDecimal, isZeroDecimal, isNegativeDecimal } from "@/lib/decimal";

/**
 * Returns the list of violations; empty when the request is acceptable.
 */
export const findOrderViolations = (request: OrderRequest, market: Market): string[] => {
  const violations: string[] = [];

  const parsed = v.safeParse(orderRequestSchema, request);
  if (!parsed.success) {
    for (const issue of parsed.issues) {
      const path = v.getDotPath(issue);
      violations.push(path ? `${path}: ${issue.message}` : issue.message);
    }
    return violations;
  }

  if (request.symbol !== market.symbol) {
    violations.push(`symbol ${request.symbol} does not match market ${market.symbol}`);
  }

  if (isZeroDecimal(request.quantity) || isNegativeDecimal(request.quantity)) {
    violations.push("quantity must be positive");
  } else {
    if (decimalScale(request.quantity) > market.basePrecision) {
      violations.push(
        `quantity ${formatDecimal(request.quantity)} exceeds ${market.basePrecision} decimal places`,
      );
    }
    if (compareDecimal(request.quantity, market.minQuantity) < 0) {
      violations.push(
        `quantity ${formatDecimal(request.quantity)} is below minimum ${formatDecimal(market.minQuantity)}`,
      );
    }
  }

  if (request.type === "LIMIT" && request.price === undefined) {
    violations.push("price is required for LIMIT orders");
  }
  if (request.type === "STOP" && request.stopPrice === undefined) {
    violations.push("stopPrice is required for STOP orders");
  }

  for (const [field, value] of [
    ["price", request.price],
    ["stopPrice", request.stopPrice],
  ] as const) {
    if (value === undefined) continue;
    if (isZeroDecimal(value) || isNegativeDecimal(value)) {
      violations.push(`${field} must be positive`);
    } else if (decimalScale(value) > market.quotePrecision) {
      violations.push(
        `${field} ${formatDecimal(value)} exceeds ${market.quotePrecision} decimal places`,
      );
    }
  }

  return violations;
};

/**
 * Throws `REJECTED / INVALID_ORDER` listing every violation.
 *
 * @example
 * ```typescript
 * validateOrderRequest(request, await markets.get(request.symbol), "binance");
 * ```
 */
export const validateOrderRequest = (
  request: OrderRequest,
  market: Market,
  exchange: string,
): void => {
  const violations = findOrderViolations(request, market);
  if (violations.length > 0) {
    throw new ExchangeError("REJECTED", `Invalid order: ${violations.join("; ")}`, {
      exchange,
      operation: "placeOrder",
      reason: "INVALID_ORDER",
    });
  }
};

/**
 * Throws `REJECTED / INVALID_ORDER` unless the lookup names an order id or a
 * client order id.
 */
export const validateOrderLookup = (lookup: OrderLookup, exchange: string, operation: string): void => {
  if (lookup.orderId === undefined && lookup.clientOrderId === undefined) {
    throw new ExchangeError("REJECTED", "Order lookup needs an orderId or a clientOrderId", {
      exchange,
      operation,
      reason: "INVALID_ORDER",
    });
  }
};
