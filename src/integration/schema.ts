/**
 * Integration Module - Schemas and Types
 */
import type { BrokerConfig, Config, SetupError } from "../config.js";
import type { Gateway, GatewayError } from "../gateway/index.js";
import type { MotionRouter } from "../motion/index.js";
import type {
  MqttTransport,
  TransportOptions,
  ZoneTopicMap,
} from "../mqtt/index.js";
import type {
  InMemoryDeviceRegistry,
  InMemoryEntityRegistry,
} from "../registry/index.js";
import type { DeviceEntry, ZoneManager } from "../zones/index.js";

export type IntegrationError = SetupError | GatewayError;

export type SetupOptions = Readonly<{
  /** Defaults to the process configuration */
  config?: Config;
  /** Defaults to the MQTT transport */
  createTransport?: (options: TransportOptions) => MqttTransport;
}>;

/**
 * One running session: broker pipeline plus host environment.
 */
export type Integration = Readonly<{
  sessionId: string;
  broker: BrokerConfig;
  topics: ZoneTopicMap;
  gateway: Gateway;
  zones: ZoneManager;
  router: MotionRouter;
  entities: InMemoryEntityRegistry;
  devices: InMemoryDeviceRegistry;
  hub: DeviceEntry;
}>;
