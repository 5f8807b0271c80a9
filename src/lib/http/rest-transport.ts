/**
 * REST transport: one logical request, possibly several attempts.
 *
 * Each attempt runs admission → signing (fresh timestamp) → HTTP call with a
 * per-attempt timeout inside the exchange's circuit breaker → lossless JSON
 * decoding → classification. Schema validation runs once on the final body.
 * Between attempts the retry schedule decides whether and how long to wait;
 * caller cancellation stops everything immediately.
 */

import * as v from "valibot";

import {
  DeadlineExceededError,
  ExchangeError,
  RequestAbortedError,
  isExchangeError,
} from "@/adapters/errors";
import { sleep, throwIfAborted } from "@/lib/async";
import { type Logger, logger as defaultLogger } from "@/lib/logger";
import {
  type CircuitBreaker,
  type RateLimiter,
  type RestEndpointClass,
  type RetryPolicy,
  DEFAULT_RETRY_POLICY,
  createCircuitBreaker,
  createRetrySchedule,
} from "@/lib/rate-limiter";
import { type HttpMethod, type QueryParams, type Signer, encodeQuery } from "@/lib/signer";

import { type BodyClassifier, classifyNetworkFailure, classifyResponse, protocolError } from "./classify";
import { parseJsonLossless } from "./json";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | undefined;

export interface RestTransportConfig {
  exchange: string;
  baseUrl: string;
  rateLimiter: RateLimiter;
  /** Required for `signed` requests */
  signer?: Signer;
  circuitBreaker?: CircuitBreaker;
  retryPolicy?: RetryPolicy;
  /** Timeout of a single HTTP attempt */
  requestTimeoutMs?: number;
  /** Exchange-specific error code table */
  classifyBody?: BodyClassifier;
  fetch?: FetchFn;
  logger?: Logger;
  /** Jitter source for backoff */
  random?: () => number;
}

export interface RestRequest<TSchema extends v.GenericSchema> {
  /** Client operation name, carried on errors and logs */
  operation: string;
  method: HttpMethod;
  path: string;
  /** Sent in insertion order; undefined values are skipped */
  query?: Record<string, QueryValue>;
  /** Serialized as JSON */
  body?: Record<string, unknown>;
  endpointClass: RestEndpointClass;
  signed?: boolean;
  weight?: number;
  schema: TSchema;
  signal?: AbortSignal;
  /** Deadline for the whole request including waits and retries */
  timeoutMs?: number;
}

export interface RestTransportMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalAttempts: number;
  totalRetries: number;
  circuitBreakerTrips: number;
}

export interface RestTransport {
  readonly exchange: string;
  request: <TSchema extends v.GenericSchema>(
    request: RestRequest<TSchema>,
  ) => Promise<v.InferOutput<TSchema>>;
  getMetrics: () => RestTransportMetrics;
  getCircuitState: () => "CLOSED" | "OPEN" | "HALF_OPEN";
}

const toQueryParams = (query: Record<string, QueryValue> | undefined): QueryParams =>
  Object.entries(query ?? {}).flatMap(([key, value]): Array<[string, string]> =>
    value === undefined ? [] : [[key, String(value)]],
  );

const describeIssues = (issues: readonly v.BaseIssue<unknown>[]): string =>
  issues
    .slice(0, 3)
    .map((issue) => {
      const path = issue.path?.map((item) => String(item.key)).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");

/**
 * Creates a REST transport for one exchange.
 *
 * @example
 * ```typescript
 * const transport = createRestTransport({
 *   exchange: "binance",
 *   baseUrl: "https://api.binance.com",
 *   rateLimiter: createRateLimiter({ exchange: "binance", limits: BINANCE_RATE_LIMITS }),
 * });
 *
 * const depth = await transport.request({
 *   operation: "getOrderBook",
 *   method: "GET",
 *   path: "/api/v3/depth",
 *   query: { symbol: "BTCUSDT", limit: 100 },
 *   endpointClass: "public",
 *   schema: depthResponseSchema,
 * });
 * ```
 */
export const createRestTransport = (config: RestTransportConfig): RestTransport => {
  const {
    exchange,
    baseUrl,
    rateLimiter,
    signer,
    circuitBreaker = createCircuitBreaker(exchange),
    retryPolicy = DEFAULT_RETRY_POLICY,
    requestTimeoutMs = 10_000,
    classifyBody,
    fetch: fetchFn = (url, init) => fetch(url, init),
    random,
  } = config;
  const log = (config.logger ?? defaultLogger).child({ exchange, component: "rest" });
  const origin = baseUrl.replace(/\/$/, "");

  const metrics: RestTransportMetrics = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalAttempts: 0,
    totalRetries: 0,
    circuitBreakerTrips: 0,
  };

  circuitBreaker.onStateChange((state) => {
    if (state === "OPEN") {
      metrics.circuitBreakerTrips++;
      log.warn("Circuit breaker opened", { trips: metrics.circuitBreakerTrips });
    } else if (state === "CLOSED") {
      log.info("Circuit breaker closed");
    }
  });

  /**
   * One HTTP round trip. Throws classified errors so the breaker sees
   * TRANSPORT failures; returns the decoded body on success.
   */
  const send = async (
    operation: string,
    url: string,
    init: RequestInit,
    breakerSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    attemptTimeoutMs: number,
  ): Promise<unknown> => {
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    callerSignal?.addEventListener("abort", abort, { once: true });
    breakerSignal.addEventListener("abort", abort, { once: true });
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, attemptTimeoutMs);

    try {
      let response: Response;
      let text: string;
      try {
        response = await fetchFn(url, { ...init, signal: controller.signal });
        text = await response.text();
      } catch (error) {
        if (callerSignal?.aborted) {
          throw new RequestAbortedError("Request aborted", error);
        }
        if (timedOut) {
          throw new ExchangeError("TRANSPORT", `Request timed out after ${attemptTimeoutMs}ms`, {
            exchange,
            operation,
            cause: error,
          });
        }
        throw classifyNetworkFailure(error, { exchange, operation });
      }

      let body: unknown = null;
      let decoded = false;
      if (text.length > 0) {
        try {
          body = parseJsonLossless(text);
          decoded = true;
        } catch {
          body = null;
        }
      }

      const classified = classifyResponse({
        exchange,
        operation,
        status: response.status,
        headers: response.headers,
        body,
        classifyBody,
      });
      if (classified) {
        throw classified;
      }
      if (!decoded) {
        throw protocolError(`Expected a JSON body, got ${text.length} bytes`, {
          exchange,
          operation,
          status: response.status,
        });
      }
      return body;
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener("abort", abort);
      breakerSignal.removeEventListener("abort", abort);
    }
  };

  const request = async <TSchema extends v.GenericSchema>(
    req: RestRequest<TSchema>,
  ): Promise<v.InferOutput<TSchema>> => {
    const { operation, method, path, endpointClass, signed = false, weight = 1, schema, signal } = req;
    metrics.totalRequests++;

    if (signed && !signer) {
      throw new ExchangeError("AUTH", `${operation} requires credentials`, { exchange, operation });
    }

    const deadlineAt = req.timeoutMs === undefined ? undefined : Date.now() + req.timeoutMs;
    const remainingMs = (): number | undefined =>
      deadlineAt === undefined ? undefined : Math.max(0, deadlineAt - Date.now());

    const query = toQueryParams(req.query);
    const body = req.body === undefined ? undefined : JSON.stringify(req.body);
    const schedule = createRetrySchedule(retryPolicy, { random });

    const attemptOnce = async (): Promise<unknown> => {
      throwIfAborted(signal);
      await rateLimiter.acquire(endpointClass, { weight, timeoutMs: remainingMs(), signal });

      const left = remainingMs();
      if (left === 0 && req.timeoutMs !== undefined) {
        throw new DeadlineExceededError(`${operation} exceeded its ${req.timeoutMs}ms deadline`, req.timeoutMs);
      }
      const attemptTimeoutMs = left === undefined ? requestTimeoutMs : Math.min(left, requestTimeoutMs);

      const signedParts =
        signed && signer
          ? signer.sign({ method, path, query, ...(body !== undefined && { body }) })
          : { queryString: encodeQuery(query), headers: {} };

      const url = `${origin}${path}${signedParts.queryString ? `?${signedParts.queryString}` : ""}`;
      const headers: Record<string, string> = {
        Accept: "application/json",
        ...signedParts.headers,
        ...(body !== undefined && { "Content-Type": "application/json" }),
      };

      return circuitBreaker.execute(
        (breakerSignal) =>
          send(operation, url, { method, headers, body }, breakerSignal, signal, attemptTimeoutMs),
        signal,
      );
    };

    for (;;) {
      const attempt = schedule.begin();
      metrics.totalAttempts++;

      let payload: unknown;
      try {
        payload = await attemptOnce();
      } catch (error) {
        if (!isExchangeError(error)) {
          metrics.failedRequests++;
          throw error;
        }

        const failure = error.withDetails({ operation, attempts: attempt });
        if (failure.kind === "RATE_LIMITED") {
          rateLimiter.penalize(
            endpointClass,
            failure.retryAfterMs ?? retryPolicy.rateLimitBackoff.initialDelayMs,
          );
        }

        const decision = schedule.next(failure);
        const left = remainingMs();
        if (decision.action === "give-up" || (left !== undefined && decision.delayMs >= left)) {
          metrics.failedRequests++;
          log.warn("Request failed", {
            operation,
            path,
            kind: failure.kind,
            attempts: attempt,
            reason: decision.action === "give-up" ? decision.reason : "DEADLINE",
            error: failure.message,
          });
          throw failure;
        }

        metrics.totalRetries++;
        log.debug("Retrying request", {
          operation,
          path,
          attempt: decision.attempt,
          delayMs: decision.delayMs,
          error: failure.message,
        });
        await sleep(decision.delayMs, signal);
        continue;
      }

      const parsed = v.safeParse(schema, payload);
      if (!parsed.success) {
        metrics.failedRequests++;
        throw protocolError(`Unexpected ${operation} response: ${describeIssues(parsed.issues)}`, {
          exchange,
          operation,
        }).withDetails({ attempts: attempt });
      }

      metrics.successfulRequests++;
      if (attempt > 1) {
        log.info("Request succeeded after retry", { operation, path, attempts: attempt });
      }
      return parsed.output;
    }
  };

  return {
    exchange,
    request,
    getMetrics: () => ({ ...metrics }),
    getCircuitState: () => circuitBreaker.getState(),
  };
};
