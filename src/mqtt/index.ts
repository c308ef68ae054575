/**
 * MQTT Module - Public API
 *
 * Zone topic transport: typed subscriptions, backoff reconnection and the
 * serialized dispatch queue.
 */

// Types
export type {
  InboundMessage,
  MessageHandler,
  MqttTransport,
  TransportOptions,
  ZoneTopic,
  ZoneTopicMap,
} from "./schema.js";
export type { DispatchQueue } from "./dispatch.js";
export type { TransportError } from "./errors.js";

export { ZONE_TOPICS } from "./schema.js";

// Service functions
export { createMqttTransport } from "./service.js";
export { createDispatchQueue } from "./dispatch.js";

// Pure transformations
export {
  brokerUrl,
  computeReconnectDelay,
  resolveZoneTopic,
} from "./transform.js";
