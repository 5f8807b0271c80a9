/**
 * Maps HTTP responses and network failures onto the exchange error taxonomy.
 *
 * Order of precedence for a response:
 * 1. A recognised error body goes through the adapter's code table first
 * 2. HTTP status (401/403 AUTH, 408 TRANSPORT, 418/429 RATE_LIMITED,
 *    other 4xx REJECTED, 5xx TRANSPORT)
 * 3. Error bodies sent with a 2xx status fall back to message patterns
 *
 * A 4xx response other than 429 is never retryable, whatever its kind.
 */

import { ExchangeError, type RejectionReason } from "@/adapters/errors";
import { getNetworkErrorCode, parseRetryAfterMs } from "@/lib/rate-limiter/backoff";

export interface ErrorBody {
  code?: string;
  message: string;
}

export interface BodyClassifierContext {
  exchange: string;
  operation: string;
  status: number;
  error: ErrorBody;
  retryAfterMs: number | undefined;
}

/**
 * Per-adapter code table. Return `null` to fall through to the generic rules.
 */
export type BodyClassifier = (context: BodyClassifierContext) => ExchangeError | null;

export interface ClassifyResponseInput {
  exchange: string;
  operation: string;
  status: number;
  headers: Headers;
  body: unknown;
  classifyBody?: BodyClassifier;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const codeToString = (value: unknown): string | undefined =>
  typeof value === "number" || typeof value === "string" ? String(value) : undefined;

/**
 * Recognises the error body shapes exchanges use:
 * `{code,msg}`, `{retCode,retMsg}`, `{error:[...]}`, `{error:{message}}` and,
 * on non-2xx responses only, a bare `{message}`.
 */
export const extractErrorBody = (body: unknown, status: number): ErrorBody | null => {
  if (!isRecord(body)) {
    return null;
  }

  if ("retCode" in body && typeof body.retCode === "number") {
    if (body.retCode === 0) return null;
    return {
      code: String(body.retCode),
      message: typeof body.retMsg === "string" ? body.retMsg : "",
    };
  }

  if ("code" in body && typeof body.msg === "string") {
    const code = codeToString(body.code);
    if (code === undefined || code === "0" || code === "200") return null;
    return { code, message: body.msg };
  }

  if (Array.isArray(body.error)) {
    const messages = body.error.filter((entry): entry is string => typeof entry === "string");
    if (messages.length === 0) return null;
    return { message: messages.join("; ") };
  }

  if (isRecord(body.error) && typeof body.error.message === "string") {
    const code = codeToString(body.error.code);
    return code === undefined
      ? { message: body.error.message }
      : { code, message: body.error.message };
  }

  if (status >= 400 && typeof body.message === "string") {
    const code = codeToString(body.code);
    return code === undefined ? { message: body.message } : { code, message: body.message };
  }

  return null;
};

const REJECTION_PATTERNS: ReadonlyArray<readonly [RegExp, RejectionReason]> = [
  [/insufficient (balance|funds|margin)|account has insufficient/i, "INSUFFICIENT_BALANCE"],
  [/unknown order|order (does not exist|not found|not exists)|order.*not exist/i, "ORDER_NOT_FOUND"],
  [/duplicate|already exists|client ?order ?id.*(used|exist)/i, "DUPLICATE_ORDER"],
  [/invalid|precision|lot.?size|notional|filter failure|too (small|large)|quantity|price/i, "INVALID_ORDER"],
];

const AUTH_PATTERN = /api.?key|signature|unauthori[sz]ed|permission denied|forbidden/i;
const RATE_LIMIT_PATTERN = /too many (requests|visits)|rate limit|request weight/i;

export const reasonFromMessage = (message: string): RejectionReason => {
  for (const [pattern, reason] of REJECTION_PATTERNS) {
    if (pattern.test(message)) return reason;
  }
  return "UNKNOWN";
};

/**
 * Classifies a completed HTTP exchange. Returns `null` for a success response.
 */
export const classifyResponse = (input: ClassifyResponseInput): ExchangeError | null => {
  const { exchange, operation, status, headers, body, classifyBody } = input;
  const errorBody = extractErrorBody(body, status);
  const retryAfterMs = parseRetryAfterMs(headers.get("retry-after")) ?? undefined;

  const fatalStatus = status >= 400 && status < 500 && status !== 429;

  if (errorBody && classifyBody) {
    const classified = classifyBody({ exchange, operation, status, error: errorBody, retryAfterMs });
    if (classified) {
      return fatalStatus ? classified.withDetails({ retryable: false }) : classified;
    }
  }

  const isSuccess = status >= 200 && status < 300;
  if (isSuccess && !errorBody) {
    return null;
  }

  const message = errorBody?.message || `HTTP ${status}`;
  const details = {
    exchange,
    operation,
    status,
    exchangeCode: errorBody?.code,
    retryAfterMs,
    ...(fatalStatus && { retryable: false }),
  };

  if (status === 401 || status === 403) {
    return new ExchangeError("AUTH", message, details);
  }
  if (status === 408) {
    return new ExchangeError("TRANSPORT", message, details);
  }
  if (status === 418 || status === 429) {
    return new ExchangeError("RATE_LIMITED", message, details);
  }
  if (status >= 500) {
    return new ExchangeError("TRANSPORT", message, details);
  }
  if (errorBody) {
    if (RATE_LIMIT_PATTERN.test(message)) {
      return new ExchangeError("RATE_LIMITED", message, details);
    }
    if (AUTH_PATTERN.test(message)) {
      return new ExchangeError("AUTH", message, details);
    }
  }
  if (status >= 400 || isSuccess) {
    return new ExchangeError("REJECTED", message, { ...details, reason: reasonFromMessage(message) });
  }

  return new ExchangeError("PROTOCOL", `Unexpected HTTP status ${status}`, details);
};

/**
 * Classifies a failure that happened before a response arrived.
 */
export const classifyNetworkFailure = (
  error: unknown,
  context: { exchange: string; operation: string },
): ExchangeError => {
  if (error instanceof ExchangeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const code = getNetworkErrorCode(error);
  return new ExchangeError("TRANSPORT", code ? `${message} (${code})` : message, {
    ...context,
    cause: error,
  });
};

export const protocolError = (
  message: string,
  context: { exchange: string; operation: string; status?: number; cause?: unknown },
): ExchangeError => new ExchangeError("PROTOCOL", message, context);
