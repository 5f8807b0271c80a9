/**
 * Reference-counted registry of active (symbol, channel) subscriptions.
 *
 * All mutations are synchronous, so concurrent subscribe/unsubscribe calls
 * on the event loop never interleave inside an update.
 */

import type { SubscriptionKey } from "@/adapters/types";

export const subscriptionKeyId = (key: SubscriptionKey): string => `${key.channel}:${key.symbol}`;

export interface SubscriptionRegistry<S> {
  /** Registers a subscriber; `first` is true when the key just became active */
  add(key: SubscriptionKey, subscriber: S): { first: boolean };
  /** Deregisters a subscriber; `last` is true when the key just became inactive */
  remove(key: SubscriptionKey, subscriber: S): { last: boolean };
  subscribers(key: SubscriptionKey): readonly S[];
  refCount(key: SubscriptionKey): number;
  keys(): SubscriptionKey[];
  /** Removes every registration and returns what was registered */
  clear(): Array<{ key: SubscriptionKey; subscribers: S[] }>;
  size(): number;
}

interface Entry<S> {
  key: SubscriptionKey;
  subscribers: Set<S>;
}

export const createSubscriptionRegistry = <S>(): SubscriptionRegistry<S> => {
  const entries = new Map<string, Entry<S>>();

  const add = (key: SubscriptionKey, subscriber: S): { first: boolean } => {
    const id = subscriptionKeyId(key);
    const existing = entries.get(id);
    if (existing) {
      existing.subscribers.add(subscriber);
      return { first: false };
    }
    entries.set(id, { key: { symbol: key.symbol, channel: key.channel }, subscribers: new Set([subscriber]) });
    return { first: true };
  };

  const remove = (key: SubscriptionKey, subscriber: S): { last: boolean } => {
    const id = subscriptionKeyId(key);
    const entry = entries.get(id);
    if (!entry || !entry.subscribers.delete(subscriber)) {
      return { last: false };
    }
    if (entry.subscribers.size === 0) {
      entries.delete(id);
      return { last: true };
    }
    return { last: false };
  };

  const subscribers = (key: SubscriptionKey): readonly S[] => {
    const entry = entries.get(subscriptionKeyId(key));
    return entry ? [...entry.subscribers] : [];
  };

  const clear = (): Array<{ key: SubscriptionKey; subscribers: S[] }> => {
    const removed = [...entries.values()].map((entry) => ({
      key: entry.key,
      subscribers: [...entry.subscribers],
    }));
    entries.clear();
    return removed;
  };

  return {
    add,
    remove,
    subscribers,
    refCount: (key) => entries.get(subscriptionKeyId(key))?.subscribers.size ?? 0,
    keys: () => [...entries.values()].map((entry) => entry.key),
    clear,
    size: () => entries.size,
  };
};
