/**
 * Gateway Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { MqttTransport } from "../mqtt/index.js";
import type { ZoneStateCallbacks } from "../zone-state/index.js";
import type { GatewayError } from "./errors.js";

export type GatewayOptions = Readonly<{
  transport: MqttTransport;
}>;

/**
 * Process-facing facade over the transport and decoder.
 */
export type Gateway = {
  /** Register the decoder on both zone topics and connect. */
  start(callbacks: ZoneStateCallbacks): Promise<Result<void, GatewayError>>;
  /** Disconnect; no callback runs after this resolves. */
  stop(): Promise<void>;
  readonly connected: boolean;
};
