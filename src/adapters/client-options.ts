/**
 * Options shared by every REST/WebSocket exchange client.
 */

import type { IdempotencyWindowConfig } from "@/domains/order";
import { config } from "@/lib/config";
import type { FetchFn } from "@/lib/http";
import type { Logger } from "@/lib/logger";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "@/lib/rate-limiter";
import type { OverflowPolicy, ReconnectPolicy } from "@/stream";

import type { Credentials } from "./types";

export interface StreamOptions {
  url?: string;
  overflowPolicy?: OverflowPolicy;
  subscriberBufferSize?: number;
  idleTimeoutMs?: number;
  pingIntervalMs?: number;
  maxResyncAttempts?: number;
  reconnect?: Partial<ReconnectPolicy>;
}

export interface ExchangeClientOptions {
  /** Omit for a market-data-only client; private operations then fail with AUTH */
  credentials?: Credentials;
  baseUrl?: string;
  /** Injected HTTP implementation (defaults to global fetch) */
  fetch?: FetchFn;
  logger?: Logger;
  retry?: Partial<RetryPolicy>;
  /** Timeout of a single HTTP attempt */
  requestTimeoutMs?: number;
  stream?: StreamOptions;
  idempotency?: IdempotencyWindowConfig;
  marketRefreshIntervalMs?: number;
  /** Jitter source for retry and reconnect backoff */
  random?: () => number;
}

/** Fills retry settings from the environment-backed defaults */
export const resolveRetryPolicy = (retry: Partial<RetryPolicy> | undefined): RetryPolicy => {
  const defaults = config.transport;
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: defaults.maxAttempts,
    maxElapsedMs: defaults.maxElapsedMs,
    ...retry,
  };
};

export const resolveIdempotencyConfig = (
  idempotency: IdempotencyWindowConfig | undefined,
): IdempotencyWindowConfig => ({
  ttlMs: config.idempotency.ttlMs,
  maxEntries: config.idempotency.maxEntries,
  ...idempotency,
});
