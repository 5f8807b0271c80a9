/**
 * Bounded, serial ingestion queue between the socket and the decoder.
 *
 * Keeps per-connection processing ordered and caps memory if decoding and
 * fan-out fall behind the socket. New items are refused once full.
 */

import PQueue from "p-queue";

export interface IngestionQueueConfig {
  /** Max queued items before refusing new ones (default: 10000) */
  maxQueueSize?: number;
  /** Called with the running total when an item is refused */
  onDrop?: (dropped: number) => void;
  /** Called when the handler throws */
  onError: (error: unknown) => void;
}

export interface IngestionQueue<T> {
  /** Returns false when the item was refused */
  enqueue(item: T): boolean;
  getQueueSize(): number;
  getDroppedCount(): number;
  waitForIdle(): Promise<void>;
  clear(): void;
}

/**
 * @example
 * ```typescript
 * const ingestion = createIngestionQueue<string>((text) => dispatch(codec.decode(text)), {
 *   maxQueueSize: 5000,
 *   onDrop: (n) => logger.warn("Inbound frames dropped", { count: n }),
 *   onError: (error) => logger.error("Frame handling failed", error),
 * });
 *
 * connection.onMessage((text) => {
 *   ingestion.enqueue(text);
 * });
 * ```
 */
export const createIngestionQueue = <T>(
  handler: (item: T) => Promise<void> | void,
  queueConfig: IngestionQueueConfig,
): IngestionQueue<T> => {
  const { maxQueueSize = 10_000, onDrop, onError } = queueConfig;

  const queue = new PQueue({ concurrency: 1 });
  let droppedCount = 0;

  const enqueue = (item: T): boolean => {
    // p-queue counts waiting and running tasks separately
    if (queue.size + queue.pending >= maxQueueSize) {
      droppedCount++;
      onDrop?.(droppedCount);
      return false;
    }

    queue
      .add(async () => {
        try {
          await handler(item);
        } catch (error) {
          onError(error);
        }
      })
      .catch((error: unknown) => {
        onError(error);
      });

    return true;
  };

  const clear = (): void => {
    queue.clear();
    droppedCount = 0;
  };

  return {
    enqueue,
    getQueueSize: () => queue.size + queue.pending,
    getDroppedCount: () => droppedCount,
    waitForIdle: () => queue.onIdle(),
    clear,
  };
};
