/**
 * MQTT Module - Service Layer
 *
 * One broker session for the zone topics. Messages from the client's
 * callbacks go through the dispatch queue; handlers never run on the
 * socket read path.
 *
 * Reconnection is driven here rather than by MQTT.js (`reconnectPeriod: 0`)
 * so the delay can back off exponentially.
 */
import { lookup } from "node:dns/promises";

import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type DispatchQueue, createDispatchQueue } from "./dispatch.js";
import { type TransportError, connectionFailed } from "./errors.js";
import {
  type InboundMessage,
  type MessageHandler,
  type MqttTransport,
  type TransportOptions,
  ZONE_TOPICS,
  type ZoneTopic,
} from "./schema.js";
import {
  brokerUrl,
  computeReconnectDelay,
  resolveZoneTopic,
} from "./transform.js";

const log = createLogger("mqtt");

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wait for the client's first CONNACK, at most `timeoutMs`.
 *
 * @returns true if the session came up in time
 */
function waitForConnack(client: MqttClient, timeoutMs: number): Promise<boolean> {
  if (client.connected) return Promise.resolve(true);

  return new Promise((resolve) => {
    const onConnect = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      client.removeListener("connect", onConnect);
      resolve(false);
    }, timeoutMs);
    client.once("connect", onConnect);
  });
}

/**
 * Create the zone topic transport.
 */
export function createMqttTransport(options: TransportOptions): MqttTransport {
  const { broker, topics } = options;
  const url = brokerUrl(broker.host, broker.port);

  const handlers = new Map<ZoneTopic, MessageHandler[]>();
  let client: MqttClient | null = null;
  let queue: DispatchQueue<InboundMessage> | null = null;
  let connected = false;
  let stopping = false;
  let reconnectAttempts = 0;
  let reconnectTimer: NodeJS.Timeout | null = null;

  function setConnected(next: boolean): void {
    if (connected === next) return;
    connected = next;
    options.onConnectionChange?.(next);
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  async function deliver(message: InboundMessage): Promise<void> {
    // Copy: a handler may unsubscribe while we iterate
    const targets = [...(handlers.get(message.topic) ?? [])];

    for (const handler of targets) {
      try {
        await handler(message.payload, message.topic);
      } catch (error) {
        log.error(
          { topic: message.topic, error: toError(error).message },
          "Message handler failed",
        );
      }
    }
  }

  // ===========================================================================
  // Reconnection
  // ===========================================================================

  function clearReconnectTimer(): void {
    if (reconnectTimer) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }
  }

  function scheduleReconnect(target: MqttClient): void {
    if (reconnectTimer || stopping) return;

    const delay = computeReconnectDelay(
      reconnectAttempts,
      broker.reconnectMinMs,
      broker.reconnectMaxMs,
    );
    reconnectAttempts += 1;

    log.info({ delay, attempt: reconnectAttempts }, "Reconnecting to MQTT broker...");
    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      if (stopping || target !== client) return;
      target.reconnect();
    }, delay);
  }

  // ===========================================================================
  // Client Events
  // ===========================================================================

  function subscribeToTopics(target: MqttClient): void {
    const wireTopics = ZONE_TOPICS.map((topic) => topics[topic]);

    target.subscribe(wireTopics, (error) => {
      if (error) {
        log.error({ topics: wireTopics, error: error.message }, "Failed to subscribe to topics");
      } else {
        log.debug({ topics: wireTopics }, "Subscribed to topics");
      }
    });
  }

  function setupClientHandlers(target: MqttClient): void {
    target.on("connect", () => {
      if (target !== client) return;
      setConnected(true);
      reconnectAttempts = 0;
      clearReconnectTimer();
      log.info({ broker: url }, "Connected to MQTT broker");

      // Session is clean on every connect; subscriptions must be renewed
      subscribeToTopics(target);
    });

    target.on("message", (wireTopic, payload) => {
      const topic = resolveZoneTopic(wireTopic, topics);
      if (!topic) {
        log.debug({ topic: wireTopic }, "Ignoring message on unknown topic");
        return;
      }
      queue?.enqueue({ topic, payload });
    });

    target.on("error", (error) => {
      log.error({ error: error.message }, "MQTT client error");
    });

    target.on("close", () => {
      if (target !== client) return;
      if (connected) log.warn("MQTT connection closed");
      setConnected(false);
      scheduleReconnect(target);
    });

    target.on("offline", () => {
      if (target !== client) return;
      setConnected(false);
      log.warn("MQTT client offline");
    });
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  return {
    async connect(): Promise<Result<void, TransportError>> {
      if (client) {
        log.warn("MQTT client already initialized");
        return ok(undefined);
      }

      try {
        await lookup(broker.host);
      } catch (error) {
        const failure = connectionFailed(broker.host, broker.port, toError(error));
        log.error({ host: broker.host, port: broker.port }, failure.message);
        return err(failure);
      }

      stopping = false;
      reconnectAttempts = 0;
      queue = createDispatchQueue(deliver, (error, message) => {
        log.error(
          { topic: message.topic, error: toError(error).message },
          "Dispatch failed",
        );
      });

      log.info({ broker: url }, "Connecting to MQTT broker...");

      const created = mqtt.connect(url, {
        keepalive: broker.keepaliveSeconds,
        reconnectPeriod: 0,
        clean: true,
        ...(options.clientId ? { clientId: options.clientId } : {}),
      });
      client = created;
      setupClientHandlers(created);

      const up = await waitForConnack(created, broker.connectWaitMs);
      if (!up) {
        log.warn(
          { broker: url, waitMs: broker.connectWaitMs },
          "MQTT broker not connected yet, continuing in background",
        );
      }

      return ok(undefined);
    },

    subscribe(topic, handler) {
      const list = handlers.get(topic) ?? [];
      list.push(handler);
      handlers.set(topic, list);

      return () => {
        const current = handlers.get(topic);
        if (!current) return;
        const index = current.indexOf(handler);
        if (index !== -1) current.splice(index, 1);
      };
    },

    async disconnect() {
      stopping = true;
      clearReconnectTimer();

      const active = client;
      const activeQueue = queue;
      client = null;
      queue = null;
      setConnected(false);

      if (active) {
        log.info("Disconnecting MQTT client...");
        await active.endAsync(true);
        active.removeAllListeners();
      }

      if (activeQueue) {
        const discarded = await activeQueue.close();
        if (discarded > 0) {
          log.debug({ discarded }, "Dropped queued messages on disconnect");
        }
      }

      handlers.clear();
    },

    isConnected: () => connected,
  };
}
