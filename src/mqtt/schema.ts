/**
 * MQTT Module - Schemas and Types
 *
 * Typed topics and the transport contract. The broker topic strings are
 * configuration; code only ever names the closed `ZoneTopic` union.
 */
import type { Result } from "neverthrow";

import type { BrokerConfig } from "../config.js";
import type { TransportError } from "./errors.js";

// =============================================================================
// Topics
// =============================================================================

export const ZONE_TOPICS = ["zone-config", "zone-state"] as const;

export type ZoneTopic = (typeof ZONE_TOPICS)[number];

/**
 * Wire topic string per logical topic.
 */
export type ZoneTopicMap = Readonly<Record<ZoneTopic, string>>;

// =============================================================================
// Messages and Handlers
// =============================================================================

export type InboundMessage = Readonly<{
  topic: ZoneTopic;
  payload: Buffer;
}>;

/**
 * Handler registered for one topic. Awaited by the dispatch queue.
 */
export type MessageHandler = (
  payload: Buffer,
  topic: ZoneTopic,
) => void | Promise<unknown>;

// =============================================================================
// Transport
// =============================================================================

export type TransportOptions = Readonly<{
  broker: BrokerConfig;
  topics: ZoneTopicMap;
  clientId?: string;
  /** Called when the session goes up or down. */
  onConnectionChange?: (connected: boolean) => void;
}>;

export type MqttTransport = {
  /** Resolve the broker, open the session and wait briefly for the first CONNACK. */
  connect(): Promise<Result<void, TransportError>>;
  /** Register a handler; returns its unsubscribe function. */
  subscribe(topic: ZoneTopic, handler: MessageHandler): () => void;
  disconnect(): Promise<void>;
  isConnected(): boolean;
};
