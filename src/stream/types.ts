/**
 * Stream events delivered to subscribers, and the codec contract each
 * exchange adapter implements for its WebSocket protocol.
 */

import type {
  OrderBookUpdate,
  SubscriptionKey,
  Ticker,
  Trade,
} from "@/adapters/types";

/**
 * Events yielded by a subscription. Data events (`book`, `trade`, `ticker`)
 * are interleaved with connection events so consumers can tell a data gap
 * from a quiet market.
 */
export type StreamEvent =
  | { type: "book"; update: OrderBookUpdate }
  | { type: "trade"; trade: Trade }
  | { type: "ticker"; ticker: Ticker }
  | { type: "disconnected"; code: number; reason: string; timestamp: Date }
  | { type: "reconnected"; timestamp: Date }
  /** Book continuity was lost; a snapshot follows before further deltas */
  | { type: "resynchronizing"; symbol: string; reason: string; timestamp: Date }
  /** This subscriber fell behind and `dropped` older events were discarded */
  | { type: "lagged"; dropped: number }
  /** This subscriber fell behind and was disconnected; the sequence ends */
  | { type: "overflow"; capacity: number };

export type StreamEventType = StreamEvent["type"];

export type OverflowPolicy = "drop-oldest" | "disconnect";

/**
 * One decoded inbound frame. A single WebSocket message may carry several.
 */
export type StreamFrame =
  | { kind: "book"; update: OrderBookUpdate }
  | { kind: "trades"; trades: Trade[] }
  | { kind: "ticker"; ticker: Ticker }
  /** Response to a subscribe/unsubscribe request */
  | { kind: "ack"; requestId: number; success: boolean; message?: string }
  /** Application-level heartbeat that must be answered with `reply` */
  | { kind: "ping"; reply: string }
  | { kind: "pong" };

/**
 * Exchange-specific WebSocket protocol.
 */
export interface StreamCodec {
  readonly url: string;
  /** Topics per subscribe/unsubscribe message */
  readonly maxKeysPerMessage: number;
  /**
   * Where order-book snapshots come from: `rest` books start from a REST
   * snapshot and the stream only carries deltas, `stream` books receive a
   * snapshot on (re)subscription.
   */
  readonly snapshotSource: "rest" | "stream";
  encodeSubscribe(keys: readonly SubscriptionKey[], requestId: number): string;
  encodeUnsubscribe(keys: readonly SubscriptionKey[], requestId: number): string;
  /** Throws a `PROTOCOL` ExchangeError for frames it recognises but cannot read */
  decode(text: string): StreamFrame[];
  /** Application-level keepalive, sent instead of a WebSocket ping frame */
  encodePing?: () => string;
}
