/**
 * Order-book reconstruction with sequence checking.
 *
 * A snapshot resets the sequence counter. Right after a snapshot, deltas
 * already covered by it are discarded and the first applied delta may
 * straddle the counter (`firstSequence <= counter + 1 <= sequence`); after
 * that each delta must continue the counter exactly. Anything else is a gap
 * and the caller resynchronizes.
 */

import type { OrderBookSnapshot, OrderBookUpdate, PriceLevel } from "@/adapters/types";
import { compareDecimal, formatDecimal, isZeroDecimal, normalizeDecimal } from "@/lib/decimal";

export type BookSyncState = "AWAITING_SNAPSHOT" | "BUFFERING" | "SYNCED";

export type DeltaResult =
  | { status: "applied" }
  | { status: "stale" }
  | { status: "gap"; expected: number; received: number }
  | { status: "buffered" }
  | { status: "ignored" };

export interface SnapshotResult {
  /** Buffered deltas applied on top of the snapshot, in order */
  replayed: OrderBookUpdate[];
  /** Set when a buffered delta did not continue the snapshot */
  gap: { expected: number; received: number } | null;
}

export interface OrderBookTracker {
  readonly symbol: string;
  getState(): BookSyncState;
  getSequence(): number | null;
  /**
   * Forgets continuity and waits for a snapshot. `buffer` keeps deltas that
   * arrive meanwhile for replay; `drop` discards them.
   */
  reset(mode: "buffer" | "drop"): void;
  applySnapshot(snapshot: OrderBookUpdate): SnapshotResult;
  applyDelta(update: OrderBookUpdate): DeltaResult;
  /** Current book, best levels first; null until synced */
  getSnapshot(): OrderBookSnapshot | null;
  getBufferedCount(): number;
}

export interface OrderBookTrackerConfig {
  symbol: string;
  /** Deltas kept while a snapshot is fetched (default: 1000) */
  maxBufferedDeltas?: number;
}

const levelKey = (level: PriceLevel): string => formatDecimal(normalizeDecimal(level.price));

export const snapshotToUpdate = (snapshot: OrderBookSnapshot): OrderBookUpdate => ({
  symbol: snapshot.symbol,
  sequence: snapshot.sequence,
  isSnapshot: true,
  bids: snapshot.bids,
  asks: snapshot.asks,
  timestamp: snapshot.timestamp,
});

export const createOrderBookTracker = (trackerConfig: OrderBookTrackerConfig): OrderBookTracker => {
  const { symbol, maxBufferedDeltas = 1000 } = trackerConfig;

  const bids = new Map<string, PriceLevel>();
  const asks = new Map<string, PriceLevel>();
  let state: BookSyncState = "AWAITING_SNAPSHOT";
  let sequence: number | null = null;
  let appliedSinceSnapshot = false;
  let lastTimestamp = new Date(0);
  let buffered: OrderBookUpdate[] = [];

  const applyLevels = (side: Map<string, PriceLevel>, levels: readonly PriceLevel[]): void => {
    for (const level of levels) {
      const key = levelKey(level);
      if (isZeroDecimal(level.quantity)) {
        side.delete(key);
      } else {
        side.set(key, level);
      }
    }
  };

  const applySynced = (update: OrderBookUpdate): DeltaResult => {
    const counter = sequence ?? 0;
    const first = update.firstSequence ?? update.sequence;

    if (update.sequence <= counter) {
      if (!appliedSinceSnapshot) {
        return { status: "stale" };
      }
      return { status: "gap", expected: counter + 1, received: first };
    }

    const continues = appliedSinceSnapshot ? first === counter + 1 : first <= counter + 1;
    if (!continues) {
      return { status: "gap", expected: counter + 1, received: first };
    }

    applyLevels(bids, update.bids);
    applyLevels(asks, update.asks);
    sequence = update.sequence;
    appliedSinceSnapshot = true;
    lastTimestamp = update.timestamp;
    return { status: "applied" };
  };

  const reset = (mode: "buffer" | "drop"): void => {
    state = mode === "buffer" ? "BUFFERING" : "AWAITING_SNAPSHOT";
    buffered = [];
    appliedSinceSnapshot = false;
  };

  const applySnapshot = (snapshot: OrderBookUpdate): SnapshotResult => {
    bids.clear();
    asks.clear();
    applyLevels(bids, snapshot.bids);
    applyLevels(asks, snapshot.asks);
    sequence = snapshot.sequence;
    appliedSinceSnapshot = false;
    lastTimestamp = snapshot.timestamp;
    state = "SYNCED";

    const pending = buffered;
    buffered = [];
    const replayed: OrderBookUpdate[] = [];
    for (const delta of pending) {
      const result = applySynced(delta);
      if (result.status === "applied") {
        replayed.push(delta);
      } else if (result.status === "gap") {
        return { replayed, gap: { expected: result.expected, received: result.received } };
      }
    }
    return { replayed, gap: null };
  };

  const applyDelta = (update: OrderBookUpdate): DeltaResult => {
    if (state === "SYNCED") {
      return applySynced(update);
    }
    if (state === "BUFFERING") {
      if (buffered.length >= maxBufferedDeltas) {
        buffered.shift();
      }
      buffered.push(update);
      return { status: "buffered" };
    }
    return { status: "ignored" };
  };

  const sortedLevels = (side: Map<string, PriceLevel>, descending: boolean): PriceLevel[] =>
    [...side.values()].sort((a, b) =>
      descending ? compareDecimal(b.price, a.price) : compareDecimal(a.price, b.price),
    );

  const getSnapshot = (): OrderBookSnapshot | null => {
    if (state !== "SYNCED" || sequence === null) {
      return null;
    }
    return {
      symbol,
      sequence,
      bids: sortedLevels(bids, true),
      asks: sortedLevels(asks, false),
      timestamp: lastTimestamp,
    };
  };

  return {
    symbol,
    getState: () => state,
    getSequence: () => sequence,
    reset,
    applySnapshot,
    applyDelta,
    getSnapshot,
    getBufferedCount: () => buffered.length,
  };
};
