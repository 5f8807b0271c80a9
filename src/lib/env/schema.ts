import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const positiveIntegerSchema = (fallback: string) =>
  v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(1)),
    fallback,
  );

export const envSchema = v.object({
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // REST transport retry budget
  REST_MAX_ATTEMPTS: positiveIntegerSchema("4"),
  REST_MAX_ELAPSED_MS: positiveIntegerSchema("30000"),

  // Streaming
  STREAM_IDLE_TIMEOUT_MS: positiveIntegerSchema("30000"),
  STREAM_SUBSCRIBER_BUFFER: positiveIntegerSchema("1000"),

  // Order idempotency window
  ORDER_DEDUPE_TTL_MS: positiveIntegerSchema("600000"),
});

export type Env = v.InferOutput<typeof envSchema>;
