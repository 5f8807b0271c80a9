import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FakeWebSocket } from "@/__tests__/utils/fake-websocket";
import { createLogger } from "@/lib/logger";

import {
  type CloseCategory,
  type ConnectionState,
  MaxReconnectsExceededError,
  classifyCloseCode,
  createStreamConnection,
} from "./connection";

vi.mock("ws", async () => {
  const { FakeWebSocket: Fake } = await import("@/__tests__/utils/fake-websocket");
  return { default: Fake };
});

const silent = createLogger({ level: "error" });

const fastBackoff = { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitterFactor: 0 };

describe("classifyCloseCode", () => {
  it("should classify auth failures", () => {
    expect(classifyCloseCode(4401)).toBe("AUTH_FAILURE");
    expect(classifyCloseCode(1008)).toBe("AUTH_FAILURE");
  });

  it("should classify rate limits", () => {
    expect(classifyCloseCode(4429)).toBe("RATE_LIMITED");
    expect(classifyCloseCode(1013)).toBe("RATE_LIMITED");
  });

  it("should classify normal closures", () => {
    expect(classifyCloseCode(1000)).toBe("NORMAL");
    expect(classifyCloseCode(1006)).toBe("NORMAL");
  });

  it("should classify unknown codes", () => {
    expect(classifyCloseCode(2000)).toBe("UNKNOWN");
  });
});

describe("createStreamConnection", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    FakeWebSocket.reset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const connectOpen = async (
    connection: ReturnType<typeof createStreamConnection>,
  ): Promise<FakeWebSocket> => {
    const connecting = connection.connect();
    const socket = FakeWebSocket.latest();
    socket.open();
    await connecting;
    return socket;
  };

  describe("connect", () => {
    it("should start DISCONNECTED with generation 0", () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });

      expect(connection.getState()).toBe("DISCONNECTED");
      expect(connection.getGeneration()).toBe(0);
    });

    it("should pass through RESUBSCRIBING before CONNECTED", async () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });
      const states: ConnectionState[] = [];
      connection.onStateChange((state) => states.push(state));

      await connectOpen(connection);

      expect(states).toEqual(["CONNECTING", "RESUBSCRIBING", "CONNECTED"]);
      expect(connection.getGeneration()).toBe(1);
    });

    it("should run open hooks while RESUBSCRIBING", async () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });
      const seen: ConnectionState[] = [];
      connection.onOpen(async () => {
        seen.push(connection.getState());
      });

      await connectOpen(connection);

      expect(seen).toEqual(["RESUBSCRIBING"]);
    });

    it("should report failing open hooks and still connect", async () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });
      const errors: Error[] = [];
      connection.onError((error) => errors.push(error));
      connection.onOpen(() => Promise.reject(new Error("resubscribe failed")));

      await connectOpen(connection);

      expect(connection.getState()).toBe("CONNECTED");
      expect(errors.map((e) => e.message)).toEqual(["resubscribe failed"]);
    });

    it("should be single-flight", async () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });

      const first = connection.connect();
      const second = connection.connect();
      FakeWebSocket.latest().open();
      await Promise.all([first, second]);

      expect(FakeWebSocket.instances).toHaveLength(1);
    });

    it("should reject when the socket errors before opening", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        reconnect: { backoffConfig: fastBackoff },
      });

      const connecting = connection.connect();
      const socket = FakeWebSocket.latest();
      socket.fail(new Error("ECONNREFUSED"));
      await expect(connecting).rejects.toThrow("ECONNREFUSED");

      socket.drop(1006);
      expect(connection.isReconnectPending()).toBe(true);
    });
  });

  describe("messages", () => {
    it("should deliver text frames tagged with the generation", async () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });
      const received: Array<[string, number]> = [];
      connection.onMessage((text, generation) => received.push([text, generation]));

      const socket = await connectOpen(connection);
      socket.receive({ e: "trade" });

      expect(received).toEqual([['{"e":"trade"}', 1]]);
    });

    it("should only send while open", async () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });

      expect(connection.send("early")).toBe(false);
      const socket = await connectOpen(connection);

      expect(connection.send("hello")).toBe(true);
      expect(socket.sent).toEqual(["hello"]);
    });
  });

  describe("reconnection", () => {
    it("should reconnect after an unexpected drop", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        reconnect: { backoffConfig: fastBackoff },
      });
      const disconnects: Array<{ code: number; category: CloseCategory; willReconnect: boolean }> = [];
      connection.onDisconnected((code, _reason, category, willReconnect) => {
        disconnects.push({ code, category, willReconnect });
      });

      const socket = await connectOpen(connection);
      socket.drop(1006);

      expect(connection.getState()).toBe("DISCONNECTED");
      expect(disconnects).toEqual([{ code: 1006, category: "NORMAL", willReconnect: true }]);

      await vi.advanceTimersByTimeAsync(99);
      expect(FakeWebSocket.instances).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(FakeWebSocket.instances).toHaveLength(2);

      FakeWebSocket.latest().open();
      await vi.advanceTimersByTimeAsync(0);

      expect(connection.getState()).toBe("CONNECTED");
      expect(connection.getGeneration()).toBe(2);
    });

    it("should back off harder after a rate-limit close", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        reconnect: {
          backoffConfig: fastBackoff,
          rateLimitBackoffConfig: { ...fastBackoff, initialDelayMs: 5000, maxDelayMs: 60_000 },
        },
      });

      const socket = await connectOpen(connection);
      socket.drop(4429);

      await vi.advanceTimersByTimeAsync(4999);
      expect(FakeWebSocket.instances).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(FakeWebSocket.instances).toHaveLength(2);
    });

    it("should give up on repeated auth failures", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        reconnect: { backoffConfig: fastBackoff, maxAuthFailureAttempts: 2 },
      });
      const errors: Error[] = [];
      connection.onError((error) => errors.push(error));

      const socket = await connectOpen(connection);
      socket.drop(4401);
      await vi.advanceTimersByTimeAsync(100);
      FakeWebSocket.latest().drop(4401);
      await vi.advanceTimersByTimeAsync(200);
      FakeWebSocket.latest().drop(4401);

      expect(FakeWebSocket.instances).toHaveLength(3);
      expect(connection.isReconnectPending()).toBe(false);
      const giveUp = errors.find((e) => e instanceof MaxReconnectsExceededError);
      expect(giveUp?.message).toBe(
        "Max reconnection attempts (2) exceeded for category AUTH_FAILURE",
      );
    });

    it("should give a new session a full reconnect budget after giving up", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        reconnect: { backoffConfig: fastBackoff, maxAttempts: 1 },
      });
      const errors: Error[] = [];
      connection.onError((error) => errors.push(error));

      const first = await connectOpen(connection);
      first.drop(1006);
      await vi.advanceTimersByTimeAsync(100);
      FakeWebSocket.latest().drop(1006);
      expect(connection.isReconnectPending()).toBe(false);
      expect(errors.find((e) => e instanceof MaxReconnectsExceededError)?.message).toBe(
        "Max reconnection attempts (1) exceeded for category NORMAL",
      );

      const session = connection.connect().catch((error: unknown) => error);
      FakeWebSocket.latest().drop(1006);
      expect(await session).toBeInstanceOf(Error);
      expect(connection.isReconnectPending()).toBe(true);

      await vi.advanceTimersByTimeAsync(100);
      expect(FakeWebSocket.instances).toHaveLength(4);
    });

    it("should not reconnect after a deliberate close", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        reconnect: { backoffConfig: fastBackoff },
      });
      const onDisconnected = vi.fn();
      connection.onDisconnected(onDisconnected);

      const socket = await connectOpen(connection);
      await connection.close();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(connection.getState()).toBe("DISCONNECTED");
      expect(socket.closeCalls).toEqual([{ code: 1000, reason: "Client closing" }]);
      expect(FakeWebSocket.instances).toHaveLength(1);
      expect(onDisconnected).not.toHaveBeenCalled();
    });

    it("should cancel a pending reconnect on close", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        reconnect: { backoffConfig: fastBackoff },
      });

      const socket = await connectOpen(connection);
      socket.drop(1006);
      expect(connection.isReconnectPending()).toBe(true);

      await connection.close();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(connection.isReconnectPending()).toBe(false);
      expect(FakeWebSocket.instances).toHaveLength(1);
    });

    it("should reject a pending connect when closed", async () => {
      const connection = createStreamConnection({ url: "wss://test", logger: silent });

      const connecting = connection.connect();
      const rejection = expect(connecting).rejects.toThrow("Connection closed by client");
      await connection.close();

      await rejection;
    });
  });

  describe("keepalive", () => {
    it("should drop a silent connection after the idle timeout", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        idleTimeoutMs: 5000,
        reconnect: { backoffConfig: fastBackoff },
      });

      const socket = await connectOpen(connection);
      await vi.advanceTimersByTimeAsync(4000);
      socket.receive({ e: "trade" });
      await vi.advanceTimersByTimeAsync(4000);
      expect(socket.terminated).toBe(false);

      await vi.advanceTimersByTimeAsync(1000);
      expect(socket.terminated).toBe(true);
      expect(connection.isReconnectPending()).toBe(true);
    });

    it("should treat pongs as activity", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        idleTimeoutMs: 5000,
      });

      const socket = await connectOpen(connection);
      await vi.advanceTimersByTimeAsync(4000);
      socket.pong();
      await vi.advanceTimersByTimeAsync(4000);

      expect(socket.terminated).toBe(false);
    });

    it("should send protocol pings by default", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        pingIntervalMs: 1000,
      });

      const socket = await connectOpen(connection);
      await vi.advanceTimersByTimeAsync(2000);

      expect(socket.pings).toBe(2);
      expect(socket.sent).toEqual([]);
    });

    it("should send the app-level ping when configured", async () => {
      const connection = createStreamConnection({
        url: "wss://test",
        logger: silent,
        pingIntervalMs: 1000,
        pingMessage: () => '{"op":"ping"}',
      });

      const socket = await connectOpen(connection);
      await vi.advanceTimersByTimeAsync(1000);

      expect(socket.sent).toEqual(['{"op":"ping"}']);
      expect(socket.pings).toBe(0);
    });
  });
});
