/**
 * Bybit v5 public spot WebSocket protocol.
 *
 * Topics are `orderbook.50.<symbol>`, `publicTrade.<symbol>` and
 * `tickers.<symbol>`. A book subscription starts with a snapshot, so a
 * resubscription is enough to resynchronize. Bybit drops connections that
 * send no `{"op":"ping"}` for 20 seconds.
 *
 * @see https://bybit-exchange.github.io/docs/v5/ws/connect
 */

import * as v from "valibot";

import { parseJsonLossless, protocolError } from "@/lib/http";
import type { StreamCodec, StreamFrame } from "@/stream";

import type { Channel, SubscriptionKey } from "../types";
import { normalizeBookMessage, normalizeTickerMessage, normalizeTradeMessage } from "./normalizers";
import {
  BybitBookMessageSchema,
  BybitOpResponseSchema,
  BybitTickerMessageSchema,
  BybitTradeMessageSchema,
} from "./schemas";

export const BYBIT_STREAM_URL = "wss://stream.bybit.com/v5/public/spot";

/** Spot accepts at most 10 args per subscribe request */
const MAX_TOPICS_PER_MESSAGE = 10;

const TOPIC_PREFIX: Record<Channel, string> = {
  orderbook: "orderbook.50",
  trades: "publicTrade",
  ticker: "tickers",
};

export const toBybitTopic = (key: SubscriptionKey): string => `${TOPIC_PREFIX[key.channel]}.${key.symbol}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const decodeMessage = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  payload: unknown,
): v.InferOutput<TSchema> => {
  const parsed = v.safeParse(schema, payload);
  if (!parsed.success) {
    throw protocolError(`Malformed Bybit stream message: ${parsed.issues[0].message}`, {
      exchange: "bybit",
      operation: "stream",
    });
  }
  return parsed.output;
};

const decodeOpResponse = (payload: unknown): StreamFrame[] => {
  const response = decodeMessage(BybitOpResponseSchema, payload);
  if (response.op === "ping" || response.op === "pong") {
    return [{ kind: "pong" }];
  }
  if (response.op !== "subscribe" && response.op !== "unsubscribe") {
    return [];
  }
  const requestId = Number(response.req_id);
  if (!Number.isInteger(requestId)) {
    return [];
  }
  const success = response.success ?? false;
  return [
    {
      kind: "ack",
      requestId,
      success,
      ...(!success && response.ret_msg !== undefined && { message: response.ret_msg }),
    },
  ];
};

const decodeTopic = (topic: string, payload: unknown): StreamFrame[] => {
  if (topic.startsWith("orderbook.")) {
    return [{ kind: "book", update: normalizeBookMessage(decodeMessage(BybitBookMessageSchema, payload)) }];
  }
  if (topic.startsWith("publicTrade.")) {
    return [{ kind: "trades", trades: normalizeTradeMessage(decodeMessage(BybitTradeMessageSchema, payload)) }];
  }
  if (topic.startsWith("tickers.")) {
    return [{ kind: "ticker", ticker: normalizeTickerMessage(decodeMessage(BybitTickerMessageSchema, payload)) }];
  }
  return [];
};

export const createBybitStreamCodec = (url: string = BYBIT_STREAM_URL): StreamCodec => ({
  url,
  maxKeysPerMessage: MAX_TOPICS_PER_MESSAGE,
  snapshotSource: "stream",

  encodeSubscribe: (keys, requestId) =>
    JSON.stringify({ op: "subscribe", args: keys.map(toBybitTopic), req_id: String(requestId) }),

  encodeUnsubscribe: (keys, requestId) =>
    JSON.stringify({ op: "unsubscribe", args: keys.map(toBybitTopic), req_id: String(requestId) }),

  encodePing: () => JSON.stringify({ op: "ping" }),

  decode: (text) => {
    let payload: unknown;
    try {
      payload = parseJsonLossless(text);
    } catch (error) {
      throw protocolError("Bybit stream frame is not JSON", {
        exchange: "bybit",
        operation: "stream",
        cause: error,
      });
    }
    if (!isRecord(payload)) {
      return [];
    }
    if (typeof payload.topic === "string") {
      return decodeTopic(payload.topic, payload);
    }
    if (typeof payload.op === "string") {
      return decodeOpResponse(payload);
    }
    return [];
  },
});
