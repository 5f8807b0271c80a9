/**
 * Builds the client named by a validated configuration.
 */

import type { FetchFn } from "@/lib/http";
import type { Logger } from "@/lib/logger";

import { createBinanceClient } from "./binance";
import { createBybitClient } from "./bybit";
import type { ExchangeClientOptions } from "./client-options";
import type { ClientConfig } from "./config";
import { createPaperClient } from "./paper";
import type { Credentials, Exchange, ExchangeClient } from "./types";

/** Runtime collaborators that do not belong in a config file */
export interface ExchangeClientDependencies {
  logger?: Logger;
  fetch?: FetchFn;
}

type VenueConfig = Extract<ClientConfig, { exchange: "binance" | "bybit" }>;

const toCredentials = (exchange: Exchange, config: VenueConfig): Credentials | undefined =>
  config.apiKey !== undefined && config.apiSecret !== undefined
    ? { exchange, apiKey: config.apiKey, apiSecret: config.apiSecret }
    : undefined;

const toClientOptions = (config: VenueConfig, dependencies: ExchangeClientDependencies): ExchangeClientOptions => ({
  credentials: toCredentials(config.exchange, config),
  baseUrl: config.baseUrl,
  requestTimeoutMs: config.requestTimeoutMs,
  stream: {
    url: config.streamUrl,
    overflowPolicy: config.overflowPolicy,
    subscriberBufferSize: config.subscriberBufferSize,
  },
  logger: dependencies.logger,
  fetch: dependencies.fetch,
});

/**
 * @example
 * ```typescript
 * const client = createExchangeClient(
 *   parseClientConfig({ exchange: "bybit", apiKey, apiSecret }),
 * );
 * await client.connect();
 * ```
 */
export const createExchangeClient = (
  config: ClientConfig,
  dependencies: ExchangeClientDependencies = {},
): ExchangeClient => {
  switch (config.exchange) {
    case "binance":
      return createBinanceClient(toClientOptions(config, dependencies));
    case "bybit":
      return createBybitClient(toClientOptions(config, dependencies));
    case "paper":
      return createPaperClient({
        markets: config.markets,
        balances: config.balances,
        prices: config.prices,
        feeRate: config.feeRate,
        stream: { subscriberBufferSize: config.subscriberBufferSize },
        logger: dependencies.logger,
      });
  }
};
