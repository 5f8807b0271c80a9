/**
 * Per-client cache of exchange markets. Markets are immutable between
 * refreshes; a refresh replaces the whole set atomically.
 */

import { ExchangeError } from "@/adapters/errors";
import type { Market, RequestOptions } from "@/adapters/types";
import { type Logger, logger as defaultLogger } from "@/lib/logger";

export interface MarketCacheConfig {
  exchange: string;
  load: (options?: RequestOptions) => Promise<Market[]>;
  /** Periodic refresh interval once started (default: 1 hour) */
  refreshIntervalMs?: number;
  logger?: Logger;
}

export interface MarketCache {
  getAll(options?: RequestOptions): Promise<Market[]>;
  /** Loads on first use; throws `REJECTED / INVALID_ORDER` for an unknown symbol */
  get(symbol: string, options?: RequestOptions): Promise<Market>;
  /** Reloads now; concurrent callers share one request */
  refresh(options?: RequestOptions): Promise<Market[]>;
  /** Begins periodic refresh */
  start(): void;
  stop(): void;
  isLoaded(): boolean;
  getLastRefreshAt(): Date | null;
}

export const createMarketCache = (cacheConfig: MarketCacheConfig): MarketCache => {
  const { exchange, load, refreshIntervalMs = 60 * 60 * 1000 } = cacheConfig;
  const log = (cacheConfig.logger ?? defaultLogger).child({ exchange, component: "market-cache" });

  let markets: ReadonlyMap<string, Market> | null = null;
  let inFlight: Promise<Market[]> | null = null;
  let lastRefreshAt: Date | null = null;
  let timer: NodeJS.Timeout | null = null;

  const refresh = (options?: RequestOptions): Promise<Market[]> => {
    if (inFlight) {
      return inFlight;
    }
    const pending = load(options)
      .then((loaded) => {
        markets = new Map(loaded.map((market) => [market.symbol, market]));
        lastRefreshAt = new Date();
        log.debug("Markets refreshed", { count: loaded.length });
        return loaded;
      })
      .finally(() => {
        inFlight = null;
      });
    inFlight = pending;
    return pending;
  };

  const getAll = async (options?: RequestOptions): Promise<Market[]> => {
    if (markets === null) {
      return refresh(options);
    }
    return [...markets.values()];
  };

  const get = async (symbol: string, options?: RequestOptions): Promise<Market> => {
    if (markets === null) {
      await refresh(options);
    }
    const market = markets?.get(symbol);
    if (!market) {
      throw new ExchangeError("REJECTED", `Unknown symbol: ${symbol}`, {
        exchange,
        reason: "INVALID_ORDER",
      });
    }
    return market;
  };

  const start = (): void => {
    if (timer) return;
    timer = setInterval(() => {
      refresh().catch((error: unknown) => {
        log.warn("Periodic market refresh failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, refreshIntervalMs);
  };

  const stop = (): void => {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
  };

  return {
    getAll,
    get,
    refresh,
    start,
    stop,
    isLoaded: () => markets !== null,
    getLastRefreshAt: () => lastRefreshAt,
  };
};
