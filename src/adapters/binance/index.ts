export { BINANCE_BASE_URL, createBinanceClient, type BinanceClientOptions } from "./client";
export { classifyBinanceError } from "./errors";
export {
  BINANCE_ENDPOINT_WEIGHTS,
  BINANCE_RATE_LIMITS,
  getBinanceDepthWeight,
  getBinanceEndpointWeight,
  getBinanceOpenOrdersWeight,
} from "./rate-limits";
export { BINANCE_RECV_WINDOW_MS, binanceSigningScheme } from "./signing";
export { BINANCE_STREAM_URL, createBinanceStreamCodec, toBinanceStreamName } from "./stream-codec";
