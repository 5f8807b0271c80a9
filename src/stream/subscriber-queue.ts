/**
 * Per-subscriber bounded buffer exposed as an async iterator.
 *
 * Fan-out pushes without waiting; the consumer pulls at its own pace. When
 * the buffer is full the overflow policy decides:
 * - `drop-oldest`: the oldest events are discarded and the consumer next
 *   receives a `lagged` event carrying the count
 * - `disconnect`: the consumer receives `overflow` and the sequence ends
 */

import type { OverflowPolicy, StreamEvent } from "./types";

export interface SubscriberQueueConfig {
  capacity: number;
  policy: OverflowPolicy;
  /** Called once when the queue closes for any reason */
  onClose?: () => void;
}

export interface SubscriberQueue extends AsyncIterableIterator<StreamEvent> {
  /** Returns false once the queue is closed */
  push(event: StreamEvent): boolean;
  /** Ends the sequence after buffered events are consumed */
  end(): void;
  /** Fails the sequence after buffered events are consumed */
  fail(error: Error): void;
  isClosed(): boolean;
  size(): number;
}

type Waiter = {
  resolve: (result: IteratorResult<StreamEvent>) => void;
  reject: (error: Error) => void;
};

const done = (): IteratorResult<StreamEvent> => ({ done: true, value: undefined });

export const createSubscriberQueue = (queueConfig: SubscriberQueueConfig): SubscriberQueue => {
  const { capacity, policy, onClose } = queueConfig;

  const buffer: StreamEvent[] = [];
  let dropped = 0;
  let closed = false;
  let failure: Error | null = null;
  let waiter: Waiter | null = null;

  const close = (): void => {
    if (closed) return;
    closed = true;
    onClose?.();
  };

  // Hands the next available item to a pending consumer, if any
  const settleWaiter = (): void => {
    if (!waiter) return;
    const pending = waiter;

    if (dropped > 0) {
      waiter = null;
      const count = dropped;
      dropped = 0;
      pending.resolve({ done: false, value: { type: "lagged", dropped: count } });
      return;
    }
    const event = buffer.shift();
    if (event !== undefined) {
      waiter = null;
      pending.resolve({ done: false, value: event });
      return;
    }
    if (closed) {
      waiter = null;
      if (failure) {
        const error = failure;
        failure = null;
        pending.reject(error);
      } else {
        pending.resolve(done());
      }
    }
  };

  const push = (event: StreamEvent): boolean => {
    if (closed) return false;

    if (buffer.length >= capacity) {
      if (policy === "disconnect") {
        buffer.push({ type: "overflow", capacity });
        close();
        settleWaiter();
        return false;
      }
      buffer.shift();
      dropped++;
    }

    buffer.push(event);
    settleWaiter();
    return true;
  };

  const end = (): void => {
    close();
    settleWaiter();
  };

  const fail = (error: Error): void => {
    if (closed) return;
    failure = error;
    close();
    settleWaiter();
  };

  const next = (): Promise<IteratorResult<StreamEvent>> =>
    new Promise<IteratorResult<StreamEvent>>((resolve, reject) => {
      if (waiter) {
        reject(new Error("Concurrent next() calls are not supported"));
        return;
      }
      waiter = { resolve, reject };
      settleWaiter();
    });

  // Consumer stopped iterating (break, return, throw in for-await)
  const stop = (): Promise<IteratorResult<StreamEvent>> => {
    buffer.length = 0;
    dropped = 0;
    failure = null;
    close();
    settleWaiter();
    return Promise.resolve(done());
  };

  const queue: SubscriberQueue = {
    push,
    end,
    fail,
    isClosed: () => closed,
    size: () => buffer.length,
    next,
    return: stop,
    [Symbol.asyncIterator]: () => queue,
  };
  return queue;
};
