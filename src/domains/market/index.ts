export { createMarketCache, type MarketCache, type MarketCacheConfig } from "./market-cache";
