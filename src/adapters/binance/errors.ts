/**
 * Binance error code table.
 *
 * @see https://developers.binance.com/docs/binance-spot-api-docs/errors
 */

import { type BodyClassifier, reasonFromMessage } from "@/lib/http";

import { ExchangeError, type ExchangeErrorKind, type RejectionReason } from "../errors";

type CodeRule = readonly [ExchangeErrorKind, RejectionReason?];

const BINANCE_CODES: Record<string, CodeRule> = {
  // Server and network
  "-1000": ["TRANSPORT"],
  "-1001": ["TRANSPORT"],
  "-1007": ["TRANSPORT"],

  "-1003": ["RATE_LIMITED"],
  "-1015": ["RATE_LIMITED"],

  "-1022": ["AUTH"],
  "-2014": ["AUTH"],
  "-2015": ["AUTH"],

  "-1013": ["REJECTED", "INVALID_ORDER"],
  "-1100": ["REJECTED", "INVALID_ORDER"],
  "-1102": ["REJECTED", "INVALID_ORDER"],
  "-1111": ["REJECTED", "INVALID_ORDER"],
  "-1121": ["REJECTED", "INVALID_ORDER"],
  "-2013": ["REJECTED", "ORDER_NOT_FOUND"],
};

/** Rejection codes whose reason lives in the message ("Account has insufficient balance...") */
const MESSAGE_REASON_CODES = new Set(["-2010", "-2011"]);

export const classifyBinanceError: BodyClassifier = ({
  exchange,
  operation,
  status,
  error,
  retryAfterMs,
}) => {
  if (error.code === undefined) {
    return null;
  }
  const details = { exchange, operation, status, exchangeCode: error.code, retryAfterMs };

  if (MESSAGE_REASON_CODES.has(error.code)) {
    return new ExchangeError("REJECTED", error.message, {
      ...details,
      reason: reasonFromMessage(error.message),
    });
  }

  const rule = BINANCE_CODES[error.code];
  if (!rule) {
    return null;
  }
  const [kind, reason] = rule;
  return new ExchangeError(kind, error.message, { ...details, reason });
};
