/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * Malformed values crash immediately. Broker settings are checked later by
 * getBrokerConfig() so a missing host or port fails setup, not import.
 *
 * Zone bridge configuration covering:
 * - Server settings
 * - Broker connection (host, port, reconnect backoff)
 * - Zone topics
 * - Derived device/entity naming
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8083).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("ZoneBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Broker Connection
  // ==========================================================================
  BROKER_HOST: optionalString.describe("MQTT broker host"),
  MQTT_PORT: optionalString
    .pipe(z.coerce.number().int().min(1).max(65535).optional())
    .describe("MQTT broker port"),
  MQTT_KEEPALIVE_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(60)
    .describe("MQTT keepalive interval"),
  MQTT_CONNECT_WAIT_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(1000)
    .describe("How long connect() waits for the first CONNACK"),
  MQTT_RECONNECT_MIN_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(1000)
    .describe("Reconnect backoff floor"),
  MQTT_RECONNECT_MAX_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(120_000)
    .describe("Reconnect backoff ceiling"),

  // ==========================================================================
  // Zone Topics
  // ==========================================================================
  MQTT_TOPIC_ZONE_CONFIG: z
    .string()
    .default("/topic/zone-config")
    .describe("Topic carrying zone rosters"),
  MQTT_TOPIC_ZONE_STATE: z
    .string()
    .default("/topic/zone-state")
    .describe("Topic carrying zone motion state"),

  // ==========================================================================
  // Naming
  // ==========================================================================
  SESSION_ID: z
    .string()
    .min(1)
    .default("zone-hub")
    .describe("Config session id, prefix of every derived identifier"),
  HUB_NAME: z.string().min(1).default("Zone Hub").describe("Hub device name"),
  DEVICE_NAME_PREFIX: z
    .string()
    .min(1)
    .default("Zone")
    .describe("Zone device names render as '<prefix> (<zone name>)'"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse an environment map into typed config.
 */
export function parseConfig(
  env: Record<string, string | undefined>,
): ReturnType<typeof ConfigSchema.safeParse> {
  return ConfigSchema.safeParse(env);
}

// Parse at startup - crashes immediately if invalid
const parsed = parseConfig(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Broker connection settings, validated for setup.
 */
export type BrokerConfig = Readonly<{
  host: string;
  port: number;
  keepaliveSeconds: number;
  connectWaitMs: number;
  reconnectMinMs: number;
  reconnectMaxMs: number;
}>;

export type SetupError = {
  readonly type: "MISSING_CONFIG";
  readonly fields: ReadonlyArray<string>;
  readonly message: string;
};

/**
 * Broker configuration for the transport.
 * Returns an error naming every missing required field.
 */
export function getBrokerConfig(
  source: Config = config,
): Result<BrokerConfig, SetupError> {
  const missing: string[] = [];
  if (source.BROKER_HOST === undefined) missing.push("BROKER_HOST");
  if (source.MQTT_PORT === undefined) missing.push("MQTT_PORT");

  if (source.BROKER_HOST === undefined || source.MQTT_PORT === undefined) {
    return err({
      type: "MISSING_CONFIG",
      fields: missing,
      message: `Missing required configuration: ${missing.join(", ")}`,
    });
  }

  return ok({
    host: source.BROKER_HOST,
    port: source.MQTT_PORT,
    keepaliveSeconds: source.MQTT_KEEPALIVE_SECONDS,
    connectWaitMs: source.MQTT_CONNECT_WAIT_MS,
    reconnectMinMs: Math.min(
      source.MQTT_RECONNECT_MIN_MS,
      source.MQTT_RECONNECT_MAX_MS,
    ),
    reconnectMaxMs: source.MQTT_RECONNECT_MAX_MS,
  });
}

/**
 * Zone topics configuration.
 */
export function getZoneTopics(source: Config = config): Readonly<{
  "zone-config": string;
  "zone-state": string;
}> {
  return {
    "zone-config": source.MQTT_TOPIC_ZONE_CONFIG,
    "zone-state": source.MQTT_TOPIC_ZONE_STATE,
  };
}

/**
 * Naming used for derived devices and entities.
 */
export function getNamingConfig(source: Config = config): Readonly<{
  sessionId: string;
  hubName: string;
  deviceNamePrefix: string;
}> {
  return {
    sessionId: source.SESSION_ID,
    hubName: source.HUB_NAME,
    deviceNamePrefix: source.DEVICE_NAME_PREFIX,
  };
}
