/**
 * Client-side deduplication window for order submission.
 *
 * Submissions are keyed by `clientOrderId`. While a submission is in flight
 * every duplicate shares its promise; once it resolves the order stays in the
 * window for `ttlMs`. A failed submission is evicted so the caller may retry
 * with the same token.
 */

import { randomUUID } from "node:crypto";

import { LRUCache } from "lru-cache";

import { isRejection } from "@/adapters/errors";
import type { Order } from "@/adapters/types";

export interface IdempotencyWindowConfig {
  /** Retention of completed submissions (default: 600000) */
  ttlMs?: number;
  /** Max tracked tokens (default: 10000) */
  maxEntries?: number;
}

export interface SubmitHandlers {
  /** Performs the exchange call */
  place: () => Promise<Order>;
  /**
   * Fetches the order already accepted under this token. Called when the
   * exchange answers `place` with a duplicate rejection.
   */
  fetchExisting?: () => Promise<Order>;
}

export interface IdempotencyStats {
  size: number;
  hits: number;
  misses: number;
  recovered: number;
}

export interface IdempotencyWindow {
  submit(clientOrderId: string, handlers: SubmitHandlers): Promise<Order>;
  /** Records an order learnt from elsewhere (stream, REST poll) */
  remember(order: Order): void;
  forget(clientOrderId: string): void;
  getStats(): IdempotencyStats;
  clear(): void;
}

/** Fresh token accepted by every supported exchange (`[A-Za-z0-9_-]{1,36}`). */
export const generateClientOrderId = (): string => randomUUID();

/**
 * @example
 * ```typescript
 * const window = createIdempotencyWindow({ ttlMs: 600_000 });
 *
 * const order = await window.submit(request.clientOrderId, {
 *   place: () => placeOnExchange(request),
 *   fetchExisting: () => getOrder({ symbol, clientOrderId }),
 * });
 * ```
 */
export const createIdempotencyWindow = (
  windowConfig?: IdempotencyWindowConfig,
): IdempotencyWindow => {
  const { ttlMs = 600_000, maxEntries = 10_000 } = windowConfig ?? {};

  // perf.now keeps TTLs on the (fakeable) wall clock
  const entries = new LRUCache<string, Promise<Order>>({
    max: maxEntries,
    ttl: ttlMs,
    perf: {
      now: () => Date.now(),
    },
  });
  let hits = 0;
  let misses = 0;
  let recovered = 0;

  const execute = async (handlers: SubmitHandlers): Promise<Order> => {
    try {
      return await handlers.place();
    } catch (error) {
      if (handlers.fetchExisting && isRejection(error, "DUPLICATE_ORDER")) {
        recovered++;
        return handlers.fetchExisting();
      }
      throw error;
    }
  };

  const submit = (clientOrderId: string, handlers: SubmitHandlers): Promise<Order> => {
    const existing = entries.get(clientOrderId);
    if (existing !== undefined) {
      hits++;
      return existing;
    }
    misses++;

    const pending = execute(handlers);
    entries.set(clientOrderId, pending);
    pending.catch(() => {
      if (entries.peek(clientOrderId) === pending) {
        entries.delete(clientOrderId);
      }
    });
    return pending;
  };

  const remember = (order: Order): void => {
    if (order.clientOrderId === null) return;
    entries.set(order.clientOrderId, Promise.resolve(order));
  };

  const forget = (clientOrderId: string): void => {
    entries.delete(clientOrderId);
  };

  const getStats = (): IdempotencyStats => ({
    size: entries.size,
    hits,
    misses,
    recovered,
  });

  const clear = (): void => {
    entries.clear();
    hits = 0;
    misses = 0;
    recovered = 0;
  };

  return { submit, remember, forget, getStats, clear };
};
