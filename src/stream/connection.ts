/**
 * WebSocket connection with automatic reconnection, close-code policies,
 * keepalive and idle detection.
 *
 * Lifecycle:
 * DISCONNECTED → CONNECTING → RESUBSCRIBING → CONNECTED → ... → CLOSING → DISCONNECTED
 *
 * - Single-flight connect
 * - Generation ID for stale event detection
 * - Open hooks run while RESUBSCRIBING; data is live once CONNECTED
 * - Silence beyond the idle timeout terminates the socket and reconnects
 */

import WebSocket from "ws";

import { type Logger, logger as defaultLogger } from "@/lib/logger";
import {
  type BackoffConfig,
  RATE_LIMIT_BACKOFF_CONFIG,
  RECONNECT_BACKOFF_CONFIG,
  calculateBackoffMs,
} from "@/lib/rate-limiter/backoff";

export type ConnectionState =
  | "DISCONNECTED"
  | "CONNECTING"
  | "RESUBSCRIBING"
  | "CONNECTED"
  | "CLOSING";

/**
 * Close code categories for policy-based handling.
 */
export type CloseCategory = "AUTH_FAILURE" | "RATE_LIMITED" | "NORMAL" | "UNKNOWN";

/**
 * Classifies WebSocket close codes for policy decisions.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/API/CloseEvent/code
 */
export const classifyCloseCode = (code: number): CloseCategory => {
  if (code === 4401 || code === 4403 || code === 1008) return "AUTH_FAILURE";
  if (code === 4429 || code === 1013) return "RATE_LIMITED";
  if (code === 1000 || code === 1001 || code === 1006) return "NORMAL";
  return "UNKNOWN";
};

export interface ReconnectPolicy {
  enabled: boolean;
  maxAttempts: number;
  /** Lower cap for auth failures */
  maxAuthFailureAttempts: number;
  backoffConfig: BackoffConfig;
  /** Used after rate-limit closes */
  rateLimitBackoffConfig: BackoffConfig;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  enabled: true,
  maxAttempts: 10,
  maxAuthFailureAttempts: 2,
  backoffConfig: RECONNECT_BACKOFF_CONFIG,
  rateLimitBackoffConfig: RATE_LIMIT_BACKOFF_CONFIG,
};

export interface StreamConnectionConfig {
  url: string;
  reconnect?: Partial<ReconnectPolicy>;
  /** Silence (no frame, no pong) tolerated before reconnecting; 0 disables */
  idleTimeoutMs?: number;
  /** Keepalive interval; 0 disables */
  pingIntervalMs?: number;
  /** App-level ping, for exchanges that ignore protocol ping frames */
  pingMessage?: () => string;
  logger?: Logger;
  random?: () => number;
}

export type DisconnectHandler = (
  code: number,
  reason: string,
  category: CloseCategory,
  willReconnect: boolean,
) => void;

export interface StreamConnection {
  /** Connect (single-flight). Resolves once open hooks have run. */
  connect(): Promise<void>;
  /** Close deliberately and cancel any pending reconnect */
  close(): Promise<void>;
  /** Sends when open; returns false otherwise */
  send(message: string): boolean;
  getState(): ConnectionState;
  getGeneration(): number;
  isReconnectPending(): boolean;

  onOpen(handler: (generation: number) => Promise<void>): () => void;
  onDisconnected(handler: DisconnectHandler): () => void;
  onMessage(handler: (text: string, generation: number) => void): () => void;
  onStateChange(handler: (state: ConnectionState) => void): () => void;
  onError(handler: (error: Error) => void): () => void;
}

/**
 * Error raised when reconnection gives up.
 */
export class MaxReconnectsExceededError extends Error {
  public override readonly name = "MaxReconnectsExceededError";

  constructor(
    public readonly attempts: number,
    public readonly category: CloseCategory,
  ) {
    super(`Max reconnection attempts (${attempts}) exceeded for category ${category}`);
  }
}

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
};

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Creates a WebSocket connection.
 *
 * @example
 * ```typescript
 * const connection = createStreamConnection({
 *   url: "wss://stream.binance.com:9443/ws",
 *   idleTimeoutMs: 30_000,
 *   pingIntervalMs: 15_000,
 * });
 *
 * connection.onOpen(async () => {
 *   await resubscribeAll();
 * });
 *
 * connection.onMessage((text, generation) => {
 *   if (generation !== connection.getGeneration()) return; // Stale
 *   ingestion.enqueue(text);
 * });
 *
 * await connection.connect();
 * ```
 */
export const createStreamConnection = (connectionConfig: StreamConnectionConfig): StreamConnection => {
  const { url, idleTimeoutMs = 0, pingIntervalMs = 0, pingMessage, random = Math.random } =
    connectionConfig;
  const reconnect: ReconnectPolicy = { ...DEFAULT_RECONNECT_POLICY, ...connectionConfig.reconnect };
  const log = (connectionConfig.logger ?? defaultLogger).child({ component: "stream-connection", url });

  let state: ConnectionState = "DISCONNECTED";
  let ws: WebSocket | null = null;
  let generationId = 0;
  let connectPromise: Promise<void> | null = null;
  let reconnectAttempts = 0;
  let reconnectTimer: NodeJS.Timeout | null = null;
  let pingTimer: NodeJS.Timeout | null = null;
  let idleTimer: NodeJS.Timeout | null = null;
  let abortPendingConnect: ((error: Error) => void) | null = null;

  const openHandlers = new Set<(generation: number) => Promise<void>>();
  const disconnectedHandlers = new Set<DisconnectHandler>();
  const messageHandlers = new Set<(text: string, generation: number) => void>();
  const stateChangeHandlers = new Set<(state: ConnectionState) => void>();
  const errorHandlers = new Set<(error: Error) => void>();

  const setState = (newState: ConnectionState): void => {
    if (state !== newState) {
      state = newState;
      for (const handler of stateChangeHandlers) {
        handler(newState);
      }
    }
  };

  const emitError = (error: Error): void => {
    for (const handler of errorHandlers) {
      handler(error);
    }
  };

  const stopTimers = (): void => {
    if (pingTimer) {
      clearInterval(pingTimer);
      pingTimer = null;
    }
    if (idleTimer) {
      clearTimeout(idleTimer);
      idleTimer = null;
    }
  };

  const touch = (socket: WebSocket): void => {
    if (idleTimeoutMs <= 0) return;
    if (idleTimer) {
      clearTimeout(idleTimer);
    }
    idleTimer = setTimeout(() => {
      idleTimer = null;
      if (ws === socket) {
        log.warn("No data within idle timeout, dropping connection", { idleTimeoutMs });
        socket.terminate();
      }
    }, idleTimeoutMs);
  };

  const startKeepalive = (socket: WebSocket): void => {
    touch(socket);
    if (pingIntervalMs <= 0) return;
    pingTimer = setInterval(() => {
      if (socket.readyState !== WebSocket.OPEN) return;
      if (pingMessage) {
        socket.send(pingMessage());
      } else {
        socket.ping();
      }
    }, pingIntervalMs);
  };

  const scheduleReconnect = (category: CloseCategory): boolean => {
    if (!reconnect.enabled) return false;

    const maxAttempts =
      category === "AUTH_FAILURE" ? reconnect.maxAuthFailureAttempts : reconnect.maxAttempts;
    if (reconnectAttempts >= maxAttempts) {
      const attempts = reconnectAttempts;
      // A later connect() starts a fresh session with the full budget
      reconnectAttempts = 0;
      emitError(new MaxReconnectsExceededError(attempts, category));
      return false;
    }

    const backoffConfig =
      category === "RATE_LIMITED" ? reconnect.rateLimitBackoffConfig : reconnect.backoffConfig;
    const delay = calculateBackoffMs(reconnectAttempts, backoffConfig, random);
    reconnectAttempts++;
    log.info("Reconnecting", { attempt: reconnectAttempts, delayMs: delay, category });

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      connect().catch((error: unknown) => {
        log.warn("Reconnect attempt failed", { error: toError(error).message });
      });
    }, delay);
    return true;
  };

  const openSocket = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      setState("CONNECTING");
      generationId++;
      const generation = generationId;
      const socket = new WebSocket(url);
      ws = socket;
      let settled = false;

      const settle = (error?: Error): void => {
        if (settled) return;
        settled = true;
        abortPendingConnect = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };
      abortPendingConnect = settle;

      socket.on("open", () => {
        if (ws !== socket) return;
        setState("RESUBSCRIBING");
        startKeepalive(socket);

        const runHooks = async (): Promise<void> => {
          for (const handler of openHandlers) {
            try {
              await handler(generation);
            } catch (error) {
              emitError(toError(error));
            }
          }
        };

        void runHooks().then(() => {
          if (ws !== socket || state !== "RESUBSCRIBING") {
            settle(new Error("Connection closed while resubscribing"));
            return;
          }
          reconnectAttempts = 0;
          setState("CONNECTED");
          settle();
        });
      });

      socket.on("message", (data: WebSocket.RawData) => {
        if (ws !== socket) return;
        touch(socket);
        const text = rawDataToString(data);
        for (const handler of messageHandlers) {
          handler(text, generation);
        }
      });

      socket.on("pong", () => {
        if (ws === socket) touch(socket);
      });

      // Errors are followed by a close event, which drives reconnection
      socket.on("error", (error: Error) => {
        if (ws !== socket) return;
        emitError(error);
        settle(error);
      });

      socket.on("close", (code: number, reason: Buffer) => {
        if (ws !== socket) return;
        ws = null;
        stopTimers();
        socket.removeAllListeners();

        const reasonText = reason.toString("utf-8");
        const category = classifyCloseCode(code);
        settle(new Error(`Connection closed (${code}${reasonText ? `: ${reasonText}` : ""})`));
        setState("DISCONNECTED");

        const willReconnect = scheduleReconnect(category);
        for (const handler of disconnectedHandlers) {
          handler(code, reasonText, category, willReconnect);
        }
      });
    });

  const connect = async (): Promise<void> => {
    if (connectPromise) {
      return connectPromise;
    }
    if (state === "CONNECTED" || state === "RESUBSCRIBING" || reconnectTimer) {
      return;
    }

    connectPromise = openSocket();
    try {
      await connectPromise;
    } finally {
      connectPromise = null;
    }
  };

  const close = async (): Promise<void> => {
    if (reconnectTimer) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }
    reconnectAttempts = 0;
    stopTimers();

    const socket = ws;
    if (!socket) {
      setState("DISCONNECTED");
      return;
    }

    setState("CLOSING");
    ws = null;
    abortPendingConnect?.(new Error("Connection closed by client"));
    socket.removeAllListeners();
    // ws emits an error when a socket is closed before the handshake completes
    socket.on("error", (error: Error) => {
      log.debug("Socket error while closing", { error: error.message });
    });
    if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
      socket.close(1000, "Client closing");
    }
    setState("DISCONNECTED");
  };

  const send = (message: string): boolean => {
    if (ws?.readyState !== WebSocket.OPEN) {
      return false;
    }
    ws.send(message);
    return true;
  };

  const subscribeTo =
    <T>(handlers: Set<T>) =>
    (handler: T): (() => void) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    };

  return {
    connect,
    close,
    send,
    getState: () => state,
    getGeneration: () => generationId,
    isReconnectPending: () => reconnectTimer !== null,
    onOpen: subscribeTo(openHandlers),
    onDisconnected: subscribeTo(disconnectedHandlers),
    onMessage: subscribeTo(messageHandlers),
    onStateChange: subscribeTo(stateChangeHandlers),
    onError: subscribeTo(errorHandlers),
  };
};
