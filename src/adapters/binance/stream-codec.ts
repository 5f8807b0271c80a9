/**
 * Binance spot WebSocket protocol.
 *
 * Streams are named `<symbol>@depth@100ms`, `<symbol>@trade` and
 * `<symbol>@ticker` (lowercase). Depth streams carry deltas only; books
 * start from a REST snapshot. Binance sends protocol-level pings, which
 * `ws` answers on its own.
 *
 * @see https://developers.binance.com/docs/binance-spot-api-docs/web-socket-streams
 */

import * as v from "valibot";

import { parseJsonLossless, protocolError } from "@/lib/http";
import type { StreamCodec, StreamFrame } from "@/stream";

import type { Channel, SubscriptionKey } from "../types";
import { normalizeDepthEvent, normalizeTickerEvent, normalizeTradeEvent } from "./normalizers";
import {
  BinanceDepthEventSchema,
  BinanceStreamResponseSchema,
  BinanceTickerEventSchema,
  BinanceTradeEventSchema,
} from "./schemas";

export const BINANCE_STREAM_URL = "wss://stream.binance.com:9443/ws";

/** Binance accepts up to 1024 streams per connection; batches stay small */
const MAX_STREAMS_PER_MESSAGE = 50;

const STREAM_SUFFIX: Record<Channel, string> = {
  orderbook: "depth@100ms",
  trades: "trade",
  ticker: "ticker",
};

export const toBinanceStreamName = (key: SubscriptionKey): string =>
  `${key.symbol.toLowerCase()}@${STREAM_SUFFIX[key.channel]}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const decodeEvent = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  payload: unknown,
): v.InferOutput<TSchema> => {
  const parsed = v.safeParse(schema, payload);
  if (!parsed.success) {
    throw protocolError(`Malformed Binance stream event: ${parsed.issues[0].message}`, {
      exchange: "binance",
      operation: "stream",
    });
  }
  return parsed.output;
};

const decodePayload = (payload: unknown): StreamFrame[] => {
  if (!isRecord(payload)) {
    return [];
  }

  // Combined-stream envelope
  if (typeof payload.stream === "string" && "data" in payload) {
    return decodePayload(payload.data);
  }

  if ("id" in payload && ("result" in payload || "error" in payload)) {
    const response = decodeEvent(BinanceStreamResponseSchema, payload);
    return [
      {
        kind: "ack",
        requestId: response.id,
        success: response.error === undefined,
        ...(response.error && { message: response.error.msg }),
      },
    ];
  }

  switch (payload.e) {
    case "depthUpdate":
      return [{ kind: "book", update: normalizeDepthEvent(decodeEvent(BinanceDepthEventSchema, payload)) }];
    case "trade":
      return [{ kind: "trades", trades: [normalizeTradeEvent(decodeEvent(BinanceTradeEventSchema, payload))] }];
    case "24hrTicker":
      return [{ kind: "ticker", ticker: normalizeTickerEvent(decodeEvent(BinanceTickerEventSchema, payload)) }];
    default:
      return [];
  }
};

export const createBinanceStreamCodec = (url: string = BINANCE_STREAM_URL): StreamCodec => ({
  url,
  maxKeysPerMessage: MAX_STREAMS_PER_MESSAGE,
  snapshotSource: "rest",

  encodeSubscribe: (keys, requestId) =>
    JSON.stringify({ method: "SUBSCRIBE", params: keys.map(toBinanceStreamName), id: requestId }),

  encodeUnsubscribe: (keys, requestId) =>
    JSON.stringify({ method: "UNSUBSCRIBE", params: keys.map(toBinanceStreamName), id: requestId }),

  decode: (text) => {
    let payload: unknown;
    try {
      payload = parseJsonLossless(text);
    } catch (error) {
      throw protocolError("Binance stream frame is not JSON", {
        exchange: "binance",
        operation: "stream",
        cause: error,
      });
    }
    return decodePayload(payload);
  },
});
