/**
 * MQTT Module - Pure Transformations
 */
import { ZONE_TOPICS, type ZoneTopic, type ZoneTopicMap } from "./schema.js";

/**
 * Reconnect delay for a given number of consecutive failed attempts.
 * Doubles from `minMs` and never exceeds `maxMs`.
 */
export function computeReconnectDelay(
  attempt: number,
  minMs: number,
  maxMs: number,
): number {
  const exponent = Math.max(0, Math.floor(attempt));
  return Math.min(maxMs, minMs * 2 ** exponent);
}

/**
 * Map a wire topic back to its logical topic.
 *
 * @returns null for topics this transport does not consume
 */
export function resolveZoneTopic(
  wireTopic: string,
  topics: ZoneTopicMap,
): ZoneTopic | null {
  return ZONE_TOPICS.find((topic) => topics[topic] === wireTopic) ?? null;
}

/**
 * Broker URL for MQTT.js.
 */
export function brokerUrl(host: string, port: number): string {
  return `mqtt://${host}:${port}`;
}
