/**
 * WebSocket streaming: connection supervision, subscriptions and order-book
 * sequencing shared by every exchange adapter.
 */

export {
  type CloseCategory,
  type ConnectionState,
  type ReconnectPolicy,
  type StreamConnection,
  type StreamConnectionConfig,
  DEFAULT_RECONNECT_POLICY,
  MaxReconnectsExceededError,
  classifyCloseCode,
  createStreamConnection,
} from "./connection";

export { type IngestionQueue, type IngestionQueueConfig, createIngestionQueue } from "./ingestion-queue";

export {
  type BookSyncState,
  type DeltaResult,
  type OrderBookTracker,
  type OrderBookTrackerConfig,
  type SnapshotResult,
  createOrderBookTracker,
  snapshotToUpdate,
} from "./order-book";

export { type SubscriberQueue, type SubscriberQueueConfig, createSubscriberQueue } from "./subscriber-queue";

export {
  type SubscriptionRegistry,
  createSubscriptionRegistry,
  subscriptionKeyId,
} from "./subscription-registry";

export {
  type StreamManager,
  type StreamManagerConfig,
  type StreamManagerStats,
  createStreamManager,
} from "./stream-manager";

export type { OverflowPolicy, StreamCodec, StreamEvent, StreamEventType, StreamFrame } from "./types";
