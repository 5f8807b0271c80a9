import * as v from "valibot";

import { ConfigError } from "@/adapters/errors";

import { type Env, envSchema } from "./schema";

/**
 * Validates `process.env`. Throws a {@link ConfigError} listing every failing
 * variable; a library never exits the host process.
 */
export const parseEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (result.success) {
    return result.output;
  }

  const issues = result.issues.map(
    (issue) => `${issue.path?.map((item) => String(item.key)).join(".") ?? "env"}: ${issue.message}`,
  );
  throw new ConfigError("Environment variable validation failed", issues);
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

/** Drops the cached environment so the next access re-reads `process.env`. */
export const resetEnv = (): void => {
  cachedEnv = undefined;
};

export type { Env } from "./schema";
