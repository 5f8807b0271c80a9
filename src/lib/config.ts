import { getEnv } from "./env/env";

/**
 * Grouped defaults used when a client's own options omit a value.
 * Read lazily so importing the library never parses the environment.
 */
export const config = {
  get nodeEnv() {
    return getEnv().NODE_ENV;
  },
  get logging() {
    const env = getEnv();
    return {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    } as const;
  },
  get transport() {
    const env = getEnv();
    return {
      maxAttempts: env.REST_MAX_ATTEMPTS,
      maxElapsedMs: env.REST_MAX_ELAPSED_MS,
      requestTimeoutMs: 10_000,
    } as const;
  },
  get stream() {
    const env = getEnv();
    return {
      idleTimeoutMs: env.STREAM_IDLE_TIMEOUT_MS,
      pingIntervalMs: Math.max(1000, Math.floor(env.STREAM_IDLE_TIMEOUT_MS / 2)),
      subscriberBufferSize: env.STREAM_SUBSCRIBER_BUFFER,
      maxResyncAttempts: 3,
    } as const;
  },
  get idempotency() {
    const env = getEnv();
    return {
      ttlMs: env.ORDER_DEDUPE_TTL_MS,
      maxEntries: 10_000,
    } as const;
  },
  get markets() {
    return {
      refreshIntervalMs: 60 * 60 * 1000,
    } as const;
  },
};
