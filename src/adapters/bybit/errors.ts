/**
 * Bybit v5 `retCode` table. Bybit answers most failures with HTTP 200, so
 * the code is the only reliable signal.
 *
 * @see https://bybit-exchange.github.io/docs/v5/error
 */

import type { BodyClassifier } from "@/lib/http";

import { ExchangeError, type ExchangeErrorKind, type RejectionReason } from "../errors";

type CodeRule = readonly [ExchangeErrorKind, RejectionReason?];

const BYBIT_CODES: Record<string, CodeRule> = {
  "10001": ["REJECTED", "INVALID_ORDER"],
  // Request timestamp expired; a fresh signature usually succeeds
  "10002": ["TRANSPORT"],
  "10016": ["TRANSPORT"],

  "10003": ["AUTH"],
  "10004": ["AUTH"],
  "10005": ["AUTH"],

  "10006": ["RATE_LIMITED"],
  "10018": ["RATE_LIMITED"],

  "110001": ["REJECTED", "ORDER_NOT_FOUND"],
  "170213": ["REJECTED", "ORDER_NOT_FOUND"],
  "110007": ["REJECTED", "INSUFFICIENT_BALANCE"],
  "170131": ["REJECTED", "INSUFFICIENT_BALANCE"],
  "110072": ["REJECTED", "DUPLICATE_ORDER"],
  "170141": ["REJECTED", "DUPLICATE_ORDER"],
  "170136": ["REJECTED", "INVALID_ORDER"],
  "170137": ["REJECTED", "INVALID_ORDER"],
  "170140": ["REJECTED", "INVALID_ORDER"],
};

export const classifyBybitError: BodyClassifier = ({ exchange, operation, status, error, retryAfterMs }) => {
  const rule = error.code === undefined ? undefined : BYBIT_CODES[error.code];
  if (!rule) {
    return null;
  }
  const [kind, reason] = rule;
  return new ExchangeError(kind, error.message, {
    exchange,
    operation,
    status,
    exchangeCode: error.code,
    reason,
    retryAfterMs,
  });
};
