/**
 * MQTT Module - Transport Tests
 *
 * MQTT.js is replaced by an in-process EventEmitter fake; DNS by a mock.
 */
import { EventEmitter } from "node:events";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  connect: vi.fn(),
  lookup: vi.fn(),
}));

vi.mock("mqtt", () => ({
  default: { connect: mocks.connect },
  connect: mocks.connect,
}));

vi.mock("node:dns/promises", () => ({
  lookup: mocks.lookup,
}));

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import type { BrokerConfig } from "../../config.js";
import { createMqttTransport } from "../service.js";

class FakeMqttClient extends EventEmitter {
  connected = false;
  subscribe = vi.fn(
    (_topics: string[], callback?: (error: Error | null) => void) => {
      callback?.(null);
    },
  );
  reconnect = vi.fn();
  endAsync = vi.fn(async (_force?: boolean) => {
    this.connected = false;
    this.emit("close");
  });

  /** Simulate a CONNACK. */
  acknowledge(): void {
    this.connected = true;
    this.emit("connect");
  }

  /** Simulate a dropped socket. */
  drop(): void {
    this.connected = false;
    this.emit("close");
  }

  deliver(topic: string, text: string): void {
    this.emit("message", topic, Buffer.from(text));
  }
}

const broker: BrokerConfig = {
  host: "broker.test",
  port: 1886,
  keepaliveSeconds: 60,
  connectWaitMs: 1000,
  reconnectMinMs: 1000,
  reconnectMaxMs: 120_000,
};

const topics = {
  "zone-config": "/topic/zone-config",
  "zone-state": "/topic/zone-state",
};

describe("MQTT transport", () => {
  let client: FakeMqttClient;

  beforeEach(() => {
    client = new FakeMqttClient();
    mocks.connect.mockReset();
    mocks.connect.mockImplementation(() => {
      // CONNACK arrives after the transport attached its listeners
      queueMicrotask(() => client.acknowledge());
      return client;
    });
    mocks.lookup.mockReset();
    mocks.lookup.mockResolvedValue({ address: "127.0.0.1", family: 4 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // connect
  // ===========================================================================

  describe("connect", () => {
    it("connects to the broker URL without built-in reconnection", async () => {
      const transport = createMqttTransport({ broker, topics });

      const result = await transport.connect();

      expect(result.isOk()).toBe(true);
      expect(mocks.lookup).toHaveBeenCalledWith("broker.test");
      expect(mocks.connect).toHaveBeenCalledWith(
        "mqtt://broker.test:1886",
        expect.objectContaining({ keepalive: 60, reconnectPeriod: 0 }),
      );
      expect(transport.isConnected()).toBe(true);

      await transport.disconnect();
    });

    it("subscribes to both zone topics on connect", async () => {
      const transport = createMqttTransport({ broker, topics });

      await transport.connect();

      expect(client.subscribe).toHaveBeenCalledTimes(1);
      expect(client.subscribe.mock.calls[0]?.[0]).toEqual([
        "/topic/zone-config",
        "/topic/zone-state",
      ]);

      await transport.disconnect();
    });

    it("fails with CONNECTION_FAILED when the host does not resolve", async () => {
      mocks.lookup.mockRejectedValue(new Error("getaddrinfo ENOTFOUND broker.test"));
      const transport = createMqttTransport({ broker, topics });

      const result = await transport.connect();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "CONNECTION_FAILED",
        host: "broker.test",
        port: 1886,
        message:
          "Cannot connect to MQTT broker broker.test:1886: getaddrinfo ENOTFOUND broker.test",
      });
      expect(mocks.connect).not.toHaveBeenCalled();
      expect(transport.isConnected()).toBe(false);
    });

    it("returns ok after the bounded wait when the broker is silent", async () => {
      vi.useFakeTimers();
      mocks.connect.mockImplementation(() => client);
      const transport = createMqttTransport({ broker, topics });

      const pending = transport.connect();
      await vi.advanceTimersByTimeAsync(1000);
      const result = await pending;

      expect(result.isOk()).toBe(true);
      expect(transport.isConnected()).toBe(false);

      await transport.disconnect();
    });

    it("creates a single client when called twice", async () => {
      const transport = createMqttTransport({ broker, topics });

      await transport.connect();
      await transport.connect();

      expect(mocks.connect).toHaveBeenCalledTimes(1);

      await transport.disconnect();
    });
  });

  // ===========================================================================
  // Reconnection
  // ===========================================================================

  describe("reconnection", () => {
    it("backs off exponentially and resets after a successful connect", async () => {
      vi.useFakeTimers();
      const transport = createMqttTransport({ broker, topics });
      const pending = transport.connect();
      await vi.advanceTimersByTimeAsync(0);
      await pending;

      client.drop();
      expect(transport.isConnected()).toBe(false);

      await vi.advanceTimersByTimeAsync(999);
      expect(client.reconnect).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(1);
      expect(client.reconnect).toHaveBeenCalledTimes(1);

      // Attempt failed: next delay doubles
      client.drop();
      await vi.advanceTimersByTimeAsync(1999);
      expect(client.reconnect).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(client.reconnect).toHaveBeenCalledTimes(2);

      client.acknowledge();
      expect(transport.isConnected()).toBe(true);

      client.drop();
      await vi.advanceTimersByTimeAsync(1000);
      expect(client.reconnect).toHaveBeenCalledTimes(3);

      await transport.disconnect();
    });

    it("reports each connection change once", async () => {
      const onConnectionChange = vi.fn();
      const transport = createMqttTransport({ broker, topics, onConnectionChange });
      await transport.connect();

      client.drop();
      client.drop();
      client.acknowledge();
      await transport.disconnect();

      expect(onConnectionChange.mock.calls).toEqual([[true], [false], [true], [false]]);
    });

    it("re-subscribes after a reconnect", async () => {
      const transport = createMqttTransport({ broker, topics });
      await transport.connect();

      client.drop();
      client.acknowledge();

      expect(client.subscribe).toHaveBeenCalledTimes(2);

      await transport.disconnect();
    });

    it("cancels a pending reconnect on disconnect", async () => {
      vi.useFakeTimers();
      const transport = createMqttTransport({ broker, topics });
      const pending = transport.connect();
      await vi.advanceTimersByTimeAsync(0);
      await pending;

      client.drop();
      await transport.disconnect();
      await vi.advanceTimersByTimeAsync(5000);

      expect(client.reconnect).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  describe("dispatch", () => {
    it("delivers each message to the handlers of its topic in order", async () => {
      const transport = createMqttTransport({ broker, topics });
      const calls: string[] = [];
      transport.subscribe("zone-state", (payload) => {
        calls.push(`first ${payload.toString()}`);
      });
      transport.subscribe("zone-state", async (payload) => {
        await new Promise((r) => setTimeout(r, 5));
        calls.push(`second ${payload.toString()}`);
      });
      transport.subscribe("zone-config", (payload) => {
        calls.push(`config ${payload.toString()}`);
      });
      await transport.connect();

      client.deliver("/topic/zone-state", "m1");
      client.deliver("/topic/zone-config", "m2");
      client.deliver("/topic/zone-state", "m3");

      await vi.waitFor(() => expect(calls).toHaveLength(5));
      expect(calls).toEqual([
        "first m1",
        "second m1",
        "config m2",
        "first m3",
        "second m3",
      ]);

      await transport.disconnect();
    });

    it("isolates a failing handler", async () => {
      const transport = createMqttTransport({ broker, topics });
      const seen: string[] = [];
      transport.subscribe("zone-state", (payload) => {
        if (payload.toString() === "bad") throw new Error("handler failed");
        seen.push(`a ${payload.toString()}`);
      });
      transport.subscribe("zone-state", async (payload) => {
        seen.push(`b ${payload.toString()}`);
      });
      await transport.connect();

      client.deliver("/topic/zone-state", "bad");
      client.deliver("/topic/zone-state", "good");

      await vi.waitFor(() => expect(seen).toHaveLength(3));
      expect(seen).toEqual(["b bad", "a good", "b good"]);

      await transport.disconnect();
    });

    it("ignores messages on other topics", async () => {
      const transport = createMqttTransport({ broker, topics });
      const handler = vi.fn();
      transport.subscribe("zone-state", handler);
      await transport.connect();

      client.deliver("/topic/unrelated", "{}");
      client.deliver("/topic/zone-state", "{}");

      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
      expect(handler).toHaveBeenCalledWith(Buffer.from("{}"), "zone-state");

      await transport.disconnect();
    });

    it("stops delivering to an unsubscribed handler", async () => {
      const transport = createMqttTransport({ broker, topics });
      const removed = vi.fn();
      const kept = vi.fn();
      const unsubscribe = transport.subscribe("zone-state", removed);
      transport.subscribe("zone-state", kept);
      await transport.connect();

      unsubscribe();
      client.deliver("/topic/zone-state", "{}");

      await vi.waitFor(() => expect(kept).toHaveBeenCalledTimes(1));
      expect(removed).not.toHaveBeenCalled();

      await transport.disconnect();
    });
  });

  // ===========================================================================
  // disconnect
  // ===========================================================================

  describe("disconnect", () => {
    it("ends the client and is idempotent", async () => {
      const transport = createMqttTransport({ broker, topics });
      await transport.connect();

      await transport.disconnect();
      await transport.disconnect();

      expect(client.endAsync).toHaveBeenCalledTimes(1);
      expect(transport.isConnected()).toBe(false);
    });

    it("is safe before connect", async () => {
      const transport = createMqttTransport({ broker, topics });

      await expect(transport.disconnect()).resolves.toBeUndefined();
    });

    it("delivers nothing after teardown", async () => {
      const transport = createMqttTransport({ broker, topics });
      const handler = vi.fn();
      transport.subscribe("zone-state", handler);
      await transport.connect();

      await transport.disconnect();
      client.deliver("/topic/zone-state", "{}");
      await new Promise((r) => setTimeout(r, 5));

      expect(handler).not.toHaveBeenCalled();
    });
  });
});
