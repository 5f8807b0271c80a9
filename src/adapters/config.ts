/**
 * Exchange client configuration, as read from a file or a caller's settings
 * object. One variant per exchange, keyed on `exchange`.
 */

import * as v from "valibot";

import { decimalSchema } from "@/lib/decimal";

import { ConfigError } from "./errors";

const credentialString = v.pipe(v.string(), v.minLength(1), v.regex(/^\S+$/, "Must not contain whitespace"));

const positiveInteger = v.pipe(v.number(), v.integer(), v.minValue(1));

const precision = v.pipe(v.number(), v.integer(), v.minValue(0));

const venueFields = {
  apiKey: v.optional(credentialString),
  apiSecret: v.optional(credentialString),
  baseUrl: v.optional(v.pipe(v.string(), v.url())),
  streamUrl: v.optional(v.pipe(v.string(), v.url())),
  requestTimeoutMs: v.optional(positiveInteger),
  overflowPolicy: v.optional(v.picklist(["drop-oldest", "disconnect"])),
  subscriberBufferSize: v.optional(positiveInteger),
};

export const PaperMarketSchema = v.object({
  symbol: v.pipe(v.string(), v.minLength(1)),
  base: v.pipe(v.string(), v.minLength(1)),
  quote: v.pipe(v.string(), v.minLength(1)),
  basePrecision: precision,
  quotePrecision: precision,
  minQuantity: decimalSchema,
});

export const ClientConfigSchema = v.pipe(
  v.variant("exchange", [
    v.object({ exchange: v.literal("binance"), ...venueFields }),
    v.object({ exchange: v.literal("bybit"), ...venueFields }),
    v.object({
      exchange: v.literal("paper"),
      markets: v.pipe(v.array(PaperMarketSchema), v.minLength(1)),
      balances: v.optional(v.record(v.string(), decimalSchema), {}),
      prices: v.optional(v.record(v.string(), decimalSchema), {}),
      feeRate: v.optional(decimalSchema),
      subscriberBufferSize: v.optional(positiveInteger),
    }),
  ]),
  v.check(
    (config) => config.exchange === "paper" || (config.apiKey === undefined) === (config.apiSecret === undefined),
    "apiKey and apiSecret must be set together",
  ),
);

export type ClientConfig = v.InferOutput<typeof ClientConfigSchema>;

/**
 * @throws ConfigError listing every invalid field
 */
export const parseClientConfig = (input: unknown): ClientConfig => {
  const result = v.safeParse(ClientConfigSchema, input);
  if (result.success) {
    return result.output;
  }
  const issues = result.issues.map((issue) => {
    const path = v.getDotPath(issue);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  throw new ConfigError("Invalid exchange client config", issues);
};
