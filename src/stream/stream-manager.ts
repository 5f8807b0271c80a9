/**
 * Owns one exchange WebSocket connection: the subscription registry,
 * resubscription after reconnects, serial ingestion, fan-out to bounded
 * subscriber queues, trade de-duplication and order-book sequencing.
 */

import { LRUCache } from "lru-cache";
import * as v from "valibot";

import { ConfigError, ExchangeError } from "@/adapters/errors";
import {
  type Exchange,
  type OrderBookSnapshot,
  type OrderBookUpdate,
  type SubscribeOptions,
  type Subscription,
  type SubscriptionKey,
  subscriptionKeySchema,
} from "@/adapters/types";
import { config } from "@/lib/config";
import { type Logger, logger as defaultLogger } from "@/lib/logger";
import type { RateLimiter } from "@/lib/rate-limiter";

import {
  type ConnectionState,
  MaxReconnectsExceededError,
  type ReconnectPolicy,
  createStreamConnection,
} from "./connection";
import { createIngestionQueue } from "./ingestion-queue";
import { type OrderBookTracker, createOrderBookTracker, snapshotToUpdate } from "./order-book";
import { type SubscriberQueue, createSubscriberQueue } from "./subscriber-queue";
import { createSubscriptionRegistry } from "./subscription-registry";
import type { OverflowPolicy, StreamCodec, StreamEvent, StreamFrame } from "./types";

export interface StreamManagerConfig {
  exchange: Exchange;
  codec: StreamCodec;
  /** Admits outbound control messages through the `websocket` bucket */
  rateLimiter: RateLimiter;
  /** Required when the codec's books start from a REST snapshot */
  fetchOrderBookSnapshot?: (symbol: string, signal: AbortSignal) => Promise<OrderBookSnapshot>;
  /** Applies to every subscriber of this manager (default: drop-oldest) */
  overflowPolicy?: OverflowPolicy;
  subscriberBufferSize?: number;
  idleTimeoutMs?: number;
  pingIntervalMs?: number;
  /** Consecutive resynchronizations before a book fails (default: 3) */
  maxResyncAttempts?: number;
  maxBufferedDeltas?: number;
  ingestionQueueSize?: number;
  tradeDedupe?: { maxEntries?: number; ttlMs?: number };
  reconnect?: Partial<ReconnectPolicy>;
  logger?: Logger;
  random?: () => number;
}

export interface StreamManagerStats {
  framesReceived: number;
  framesDropped: number;
  staleFrames: number;
  decodeErrors: number;
  duplicateTrades: number;
  resyncs: number;
  reconnects: number;
  subscribers: number;
}

export interface StreamManager {
  /** Registers a subscriber; connects on first use */
  subscribe(key: SubscriptionKey, options?: SubscribeOptions): Subscription;
  /** Reconstructed book, or null while not synchronized */
  getOrderBook(symbol: string): OrderBookSnapshot | null;
  getState(): ConnectionState;
  getActiveSubscriptions(): SubscriptionKey[];
  getStats(): StreamManagerStats;
  /** Ends every subscription and closes the connection */
  close(): Promise<void>;
}

type Inbound =
  | { kind: "frame"; text: string; generation: number }
  | {
      kind: "snapshot";
      symbol: string;
      generation: number;
      controller: AbortController;
      result: { ok: true; snapshot: OrderBookSnapshot } | { ok: false; error: unknown };
    };

interface ResyncState {
  attempts: number;
  controller: AbortController | null;
}

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Creates the stream manager for one exchange.
 *
 * @example
 * ```typescript
 * const streams = createStreamManager({
 *   exchange: "binance",
 *   codec: createBinanceStreamCodec(),
 *   rateLimiter,
 *   fetchOrderBookSnapshot: (symbol, signal) => client.getOrderBook(symbol, 1000, { signal }),
 * });
 *
 * const subscription = streams.subscribe({ symbol: "BTCUSDT", channel: "orderbook" });
 * for await (const event of subscription) {
 *   if (event.type === "book") render(streams.getOrderBook("BTCUSDT"));
 * }
 * ```
 */
export const createStreamManager = (managerConfig: StreamManagerConfig): StreamManager => {
  const { exchange, codec, rateLimiter, fetchOrderBookSnapshot } = managerConfig;
  const streamDefaults = config.stream;
  const overflowPolicy = managerConfig.overflowPolicy ?? "drop-oldest";
  const subscriberBufferSize = managerConfig.subscriberBufferSize ?? streamDefaults.subscriberBufferSize;
  const maxResyncAttempts = managerConfig.maxResyncAttempts ?? streamDefaults.maxResyncAttempts;
  const log = (managerConfig.logger ?? defaultLogger).child({ exchange, component: "stream-manager" });

  const restSnapshots = codec.snapshotSource === "rest";
  if (restSnapshots && !fetchOrderBookSnapshot) {
    throw new ConfigError(`${exchange} stream codec needs fetchOrderBookSnapshot for order books`);
  }
  const resetMode = restSnapshots ? "buffer" : "drop";

  const connection = createStreamConnection({
    url: codec.url,
    reconnect: managerConfig.reconnect,
    idleTimeoutMs: managerConfig.idleTimeoutMs ?? streamDefaults.idleTimeoutMs,
    pingIntervalMs: managerConfig.pingIntervalMs ?? streamDefaults.pingIntervalMs,
    pingMessage: codec.encodePing,
    logger: log,
    random: managerConfig.random,
  });

  const registry = createSubscriptionRegistry<SubscriberQueue>();
  const books = new Map<string, OrderBookTracker>();
  const resyncs = new Map<string, ResyncState>();
  const pendingRequests = new Map<number, SubscriptionKey[]>();
  const abortCleanups = new Map<SubscriberQueue, () => void>();
  const seenTrades = new LRUCache<string, true>({
    max: managerConfig.tradeDedupe?.maxEntries ?? 10_000,
    ttl: managerConfig.tradeDedupe?.ttlMs ?? 5 * 60 * 1000,
    perf: {
      now: () => Date.now(),
    },
  });

  let nextRequestId = 1;
  let live = false;
  let announceReconnect = false;
  const stats: Omit<StreamManagerStats, "subscribers" | "framesDropped"> = {
    framesReceived: 0,
    staleFrames: 0,
    decodeErrors: 0,
    duplicateTrades: 0,
    resyncs: 0,
    reconnects: 0,
  };

  // Delivery

  const deliver = (key: SubscriptionKey, event: StreamEvent): void => {
    for (const subscriber of registry.subscribers(key)) {
      subscriber.push(event);
    }
  };

  const broadcast = (event: StreamEvent): void => {
    for (const key of registry.keys()) {
      deliver(key, event);
    }
  };

  const failKey = (key: SubscriptionKey, error: ExchangeError): void => {
    for (const subscriber of registry.subscribers(key)) {
      subscriber.fail(error);
    }
  };

  const failAll = (error: ExchangeError): void => {
    for (const { subscribers } of registry.clear()) {
      for (const subscriber of subscribers) {
        subscriber.fail(error);
      }
    }
    stopAllResyncs();
    books.clear();
    resyncs.clear();
  };

  // Control messages

  const sendControl = async (
    action: "subscribe" | "unsubscribe",
    keys: readonly SubscriptionKey[],
  ): Promise<void> => {
    const generation = connection.getGeneration();
    for (const batch of chunk(keys, codec.maxKeysPerMessage)) {
      await rateLimiter.acquire("websocket");
      // A newer connection resubscribes everything itself
      if (connection.getGeneration() !== generation) return;

      const requestId = nextRequestId++;
      const message =
        action === "subscribe"
          ? codec.encodeSubscribe(batch, requestId)
          : codec.encodeUnsubscribe(batch, requestId);
      if (action === "subscribe") {
        pendingRequests.set(requestId, batch);
      }
      if (!connection.send(message)) {
        pendingRequests.delete(requestId);
        return;
      }
      log.debug(`Sent ${action}`, { requestId, keys: batch.map((k) => `${k.channel}:${k.symbol}`) });
    }
  };

  const sendInBackground = (action: "subscribe" | "unsubscribe", keys: SubscriptionKey[]): void => {
    sendControl(action, keys).catch((error: unknown) => {
      log.error(`Failed to ${action}`, error);
    });
  };

  // Order-book resynchronization

  const stopAllResyncs = (): void => {
    for (const resync of resyncs.values()) {
      resync.controller?.abort();
      resync.controller = null;
      resync.attempts = 0;
    }
  };

  const startResync = (symbol: string, counted: boolean): void => {
    const tracker = books.get(symbol);
    const resync = resyncs.get(symbol);
    if (!tracker || !resync) return;

    if (counted) {
      resync.attempts++;
      stats.resyncs++;
    }
    tracker.reset(resetMode);
    resync.controller?.abort();
    resync.controller = null;

    if (!restSnapshots || !fetchOrderBookSnapshot) {
      // Stream-snapshot exchanges send a fresh snapshot on resubscription
      const key: SubscriptionKey = { symbol, channel: "orderbook" };
      sendControl("unsubscribe", [key])
        .then(() => sendControl("subscribe", [key]))
        .catch((error: unknown) => {
          log.error("Failed to resubscribe order book", error, { symbol });
        });
      return;
    }

    const controller = new AbortController();
    resync.controller = controller;
    const generation = connection.getGeneration();
    fetchOrderBookSnapshot(symbol, controller.signal).then(
      (snapshot) => {
        ingestion.enqueue({ kind: "snapshot", symbol, generation, controller, result: { ok: true, snapshot } });
      },
      (error: unknown) => {
        ingestion.enqueue({ kind: "snapshot", symbol, generation, controller, result: { ok: false, error } });
      },
    );
  };

  const handleGap = (symbol: string, reason: string): void => {
    const resync = resyncs.get(symbol);
    if (!resync) return;
    const key: SubscriptionKey = { symbol, channel: "orderbook" };
    const gap = new ExchangeError("SEQUENCE_GAP", `Order book ${symbol}: ${reason}`, {
      exchange,
      operation: "subscribe",
    });

    if (resync.attempts >= maxResyncAttempts) {
      log.error("Order book resynchronization failed", gap, { symbol, attempts: resync.attempts });
      failKey(
        key,
        new ExchangeError(
          "PROTOCOL",
          `Order book ${symbol} failed to resynchronize after ${resync.attempts} attempts`,
          { exchange, operation: "subscribe", cause: gap },
        ),
      );
      return;
    }

    log.warn("Order book sequence gap, resynchronizing", { symbol, reason });
    deliver(key, { type: "resynchronizing", symbol, reason, timestamp: new Date() });
    startResync(symbol, true);
  };

  const deliverBook = (update: OrderBookUpdate): void => {
    deliver({ symbol: update.symbol, channel: "orderbook" }, { type: "book", update });
  };

  const applySnapshot = (tracker: OrderBookTracker, snapshot: OrderBookUpdate): void => {
    const { replayed, gap } = tracker.applySnapshot(snapshot);
    deliverBook(snapshot);
    for (const update of replayed) {
      deliverBook(update);
    }
    if (replayed.length > 0) {
      const resync = resyncs.get(tracker.symbol);
      if (resync) resync.attempts = 0;
    }
    if (gap) {
      handleGap(tracker.symbol, `expected sequence ${gap.expected}, received ${gap.received}`);
    }
  };

  const handleBookUpdate = (update: OrderBookUpdate): void => {
    const tracker = books.get(update.symbol);
    if (!tracker) return;

    if (update.isSnapshot) {
      applySnapshot(tracker, update);
      return;
    }

    const result = tracker.applyDelta(update);
    if (result.status === "applied") {
      const resync = resyncs.get(update.symbol);
      if (resync) resync.attempts = 0;
      deliverBook(update);
    } else if (result.status === "gap") {
      handleGap(update.symbol, `expected sequence ${result.expected}, received ${result.received}`);
    }
  };

  // Ingestion

  const handleFrame = (frame: StreamFrame): void => {
    switch (frame.kind) {
      case "book":
        handleBookUpdate(frame.update);
        return;
      case "trades":
        for (const trade of frame.trades) {
          const id = `${trade.symbol}:${trade.id}`;
          if (seenTrades.get(id) !== undefined) {
            stats.duplicateTrades++;
            continue;
          }
          seenTrades.set(id, true);
          deliver({ symbol: trade.symbol, channel: "trades" }, { type: "trade", trade });
        }
        return;
      case "ticker":
        deliver({ symbol: frame.ticker.symbol, channel: "ticker" }, { type: "ticker", ticker: frame.ticker });
        return;
      case "ack": {
        const keys = pendingRequests.get(frame.requestId);
        pendingRequests.delete(frame.requestId);
        if (!keys || frame.success) return;
        const message = frame.message ?? "unknown error";
        log.warn("Subscription rejected", { requestId: frame.requestId, message });
        for (const key of keys) {
          failKey(
            key,
            new ExchangeError("REJECTED", `Subscription to ${key.channel}:${key.symbol} rejected: ${message}`, {
              exchange,
              operation: "subscribe",
            }),
          );
        }
        return;
      }
      case "ping":
        connection.send(frame.reply);
        return;
      case "pong":
        return;
    }
  };

  const handleInbound = (item: Inbound): void => {
    if (item.generation !== connection.getGeneration()) {
      stats.staleFrames++;
      return;
    }

    if (item.kind === "snapshot") {
      const resync = resyncs.get(item.symbol);
      const tracker = books.get(item.symbol);
      if (!resync || !tracker || resync.controller !== item.controller) return;
      resync.controller = null;
      if (tracker.getState() !== "BUFFERING") return;

      if (item.result.ok) {
        applySnapshot(tracker, snapshotToUpdate(item.result.snapshot));
      } else {
        handleGap(item.symbol, `snapshot request failed: ${errorMessage(item.result.error)}`);
      }
      return;
    }

    let frames: StreamFrame[];
    try {
      frames = codec.decode(item.text);
    } catch (error) {
      stats.decodeErrors++;
      log.warn("Failed to decode frame", { error: errorMessage(error) });
      return;
    }
    for (const frame of frames) {
      handleFrame(frame);
    }
  };

  const ingestion = createIngestionQueue<Inbound>(handleInbound, {
    maxQueueSize: managerConfig.ingestionQueueSize ?? 10_000,
    onDrop: (dropped) => {
      log.warn("Ingestion queue full, dropping frame", { dropped });
    },
    onError: (error) => {
      log.error("Frame handling failed", error);
    },
  });

  // Connection lifecycle

  connection.onMessage((text, generation) => {
    stats.framesReceived++;
    ingestion.enqueue({ kind: "frame", text, generation });
  });

  connection.onOpen(async () => {
    if (announceReconnect) {
      announceReconnect = false;
      stats.reconnects++;
      broadcast({ type: "reconnected", timestamp: new Date() });
    }
    pendingRequests.clear();
    stopAllResyncs();
    for (const tracker of books.values()) {
      tracker.reset(resetMode);
    }

    const keys = registry.keys();
    log.info("Connected, resubscribing", { subscriptions: keys.length });
    await sendControl("subscribe", keys);

    if (restSnapshots) {
      for (const key of keys) {
        if (key.channel === "orderbook") startResync(key.symbol, false);
      }
    }
  });

  connection.onStateChange((state) => {
    if (state === "CONNECTED") live = true;
  });

  connection.onDisconnected((code, reason, category, willReconnect) => {
    pendingRequests.clear();
    stopAllResyncs();
    for (const tracker of books.values()) {
      tracker.reset(resetMode);
    }

    if (live) {
      live = false;
      announceReconnect = true;
      log.warn("Stream disconnected", { code, reason, category, willReconnect });
      broadcast({ type: "disconnected", code, reason, timestamp: new Date() });
    }

    if (!willReconnect && registry.size() > 0) {
      failAll(
        new ExchangeError("TRANSPORT", `Stream connection lost (close code ${code})`, {
          exchange,
          operation: "subscribe",
          retryable: false,
        }),
      );
    }
  });

  connection.onError((error) => {
    if (error instanceof MaxReconnectsExceededError) {
      log.error("Giving up on stream reconnection", error);
      return;
    }
    log.warn("Stream connection error", { error: error.message });
  });

  const connectInBackground = (): void => {
    connection.connect().catch((error: unknown) => {
      log.warn("Stream connect failed", { error: errorMessage(error) });
    });
  };

  const closeConnection = (): void => {
    stopAllResyncs();
    live = false;
    announceReconnect = false;
    connection.close().catch((error: unknown) => {
      log.warn("Stream close failed", { error: errorMessage(error) });
    });
  };

  // Subscriptions

  const activate = (key: SubscriptionKey): void => {
    if (key.channel === "orderbook") {
      const tracker = createOrderBookTracker({
        symbol: key.symbol,
        maxBufferedDeltas: managerConfig.maxBufferedDeltas,
      });
      tracker.reset(resetMode);
      books.set(key.symbol, tracker);
      resyncs.set(key.symbol, { attempts: 0, controller: null });
    }

    const state = connection.getState();
    if (state === "CONNECTED" || state === "RESUBSCRIBING") {
      sendInBackground("subscribe", [key]);
      if (key.channel === "orderbook" && restSnapshots) {
        startResync(key.symbol, false);
      }
    } else if (state !== "CONNECTING" && !connection.isReconnectPending()) {
      connectInBackground();
    }
  };

  const deactivate = (key: SubscriptionKey): void => {
    if (key.channel === "orderbook") {
      resyncs.get(key.symbol)?.controller?.abort();
      resyncs.delete(key.symbol);
      books.delete(key.symbol);
    }

    if (registry.size() === 0) {
      closeConnection();
      return;
    }
    if (connection.getState() === "CONNECTED") {
      sendInBackground("unsubscribe", [key]);
    }
  };

  const release = (key: SubscriptionKey, subscriber: SubscriberQueue): void => {
    abortCleanups.get(subscriber)?.();
    abortCleanups.delete(subscriber);
    if (registry.remove(key, subscriber).last) {
      deactivate(key);
    }
  };

  const subscribe = (key: SubscriptionKey, options?: SubscribeOptions): Subscription => {
    const parsed = v.safeParse(subscriptionKeySchema, key);
    if (!parsed.success) {
      throw new ExchangeError("REJECTED", `Invalid subscription key: ${parsed.issues[0].message}`, {
        exchange,
        operation: "subscribe",
      });
    }
    const normalized = parsed.output;

    const subscriber: SubscriberQueue = createSubscriberQueue({
      capacity: subscriberBufferSize,
      policy: overflowPolicy,
      onClose: () => {
        release(normalized, subscriber);
      },
    });

    const signal = options?.signal;
    if (signal?.aborted) {
      subscriber.end();
      return { key: normalized, unsubscribe: () => undefined, [Symbol.asyncIterator]: () => subscriber };
    }

    if (registry.add(normalized, subscriber).first) {
      activate(normalized);
    } else if (normalized.channel === "orderbook") {
      // Late joiners start from the current book
      const snapshot = books.get(normalized.symbol)?.getSnapshot();
      if (snapshot) {
        subscriber.push({ type: "book", update: snapshotToUpdate(snapshot) });
      }
    }

    if (signal) {
      const onAbort = (): void => {
        subscriber.end();
      };
      signal.addEventListener("abort", onAbort, { once: true });
      abortCleanups.set(subscriber, () => {
        signal.removeEventListener("abort", onAbort);
      });
    }

    return {
      key: normalized,
      unsubscribe: () => {
        subscriber.end();
      },
      [Symbol.asyncIterator]: () => subscriber,
    };
  };

  const close = async (): Promise<void> => {
    const removed = registry.clear();
    stopAllResyncs();
    books.clear();
    resyncs.clear();
    pendingRequests.clear();
    ingestion.clear();
    live = false;
    announceReconnect = false;
    await connection.close();
    for (const { subscribers } of removed) {
      for (const subscriber of subscribers) {
        subscriber.end();
      }
    }
  };

  const getStats = (): StreamManagerStats => ({
    ...stats,
    framesDropped: ingestion.getDroppedCount(),
    subscribers: registry.keys().reduce((total, key) => total + registry.refCount(key), 0),
  });

  return {
    subscribe,
    getOrderBook: (symbol) => books.get(symbol)?.getSnapshot() ?? null,
    getState: () => connection.getState(),
    getActiveSubscriptions: () => registry.keys(),
    getStats,
    close,
  };
};
