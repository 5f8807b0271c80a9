export { BYBIT_BASE_URL, createBybitClient, type BybitClientOptions } from "./client";
export { classifyBybitError } from "./errors";
export { BYBIT_RATE_LIMITS } from "./rate-limits";
export { BYBIT_RECV_WINDOW_MS, bybitSigningScheme } from "./signing";
export { BYBIT_STREAM_URL, createBybitStreamCodec, toBybitTopic } from "./stream-codec";
