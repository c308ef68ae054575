/**
 * Integration Module - Service Layer
 *
 * Builds the whole pipeline from configuration and tears it down again.
 * At most one integration runs per process.
 */
import { type Result, err, ok } from "neverthrow";

import {
  config as processConfig,
  getBrokerConfig,
  getNamingConfig,
  getZoneTopics,
} from "../config.js";
import { createGateway } from "../gateway/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { createMotionRouter } from "../motion/index.js";
import { createMqttTransport } from "../mqtt/index.js";
import {
  createDeviceRegistry,
  createEntityPlatform,
  createEntityRegistry,
  ensureHubDevice,
} from "../registry/index.js";
import {
  broadcastConnection,
  broadcastZoneRemoved,
  broadcastZoneState,
} from "../sse/index.js";
import { createZoneManager } from "../zones/index.js";
import type { Integration, IntegrationError, SetupOptions } from "./schema.js";

const log = createLogger("integration");

let current: Integration | null = null;
let starting: Promise<Result<Integration, IntegrationError>> | null = null;

/**
 * The running integration, if any.
 */
export function getIntegration(): Integration | null {
  return current;
}

/**
 * Set up the integration: validate configuration, create the host
 * environment and hub device, then start the gateway. Overlapping calls
 * share the setup in progress.
 */
export function setupIntegration(
  options: SetupOptions = {},
): Promise<Result<Integration, IntegrationError>> {
  if (current) {
    log.warn({ sessionId: current.sessionId }, "Integration already set up");
    return Promise.resolve(ok(current));
  }
  if (starting) {
    log.warn("Integration setup already in progress");
    return starting;
  }

  starting = startIntegration(options).finally(() => {
    starting = null;
  });
  return starting;
}

async function startIntegration(
  options: SetupOptions,
): Promise<Result<Integration, IntegrationError>> {
  const source = options.config ?? processConfig;
  const startTime = Date.now();

  const brokerResult = getBrokerConfig(source);
  if (brokerResult.isErr()) {
    log.error({ fields: brokerResult.error.fields }, brokerResult.error.message);
    return err(brokerResult.error);
  }

  const broker = brokerResult.value;
  const topics = getZoneTopics(source);
  const naming = getNamingConfig(source);

  logOperationStart(log, "integration setup", {
    sessionId: naming.sessionId,
    broker: `${broker.host}:${broker.port}`,
  });

  const entities = createEntityRegistry();
  const devices = createDeviceRegistry();
  const hub = ensureHubDevice(devices, naming);

  const zones = createZoneManager({
    naming,
    entities,
    devices,
    platform: createEntityPlatform({
      sessionId: naming.sessionId,
      entities,
      devices,
      publisher: broadcastZoneState,
    }),
  });
  const router = createMotionRouter(zones);

  const createTransport = options.createTransport ?? createMqttTransport;
  const transport = createTransport({
    broker,
    topics,
    clientId: `${naming.sessionId}-${crypto.randomUUID().slice(0, 8)}`,
    onConnectionChange: broadcastConnection,
  });
  const gateway = createGateway({ transport });

  const started = await gateway.start({
    async onZoneConfigUpdate(roster) {
      const summary = await zones.update(roster);
      for (const zoneId of summary.removed) {
        broadcastZoneRemoved(zoneId);
      }
    },
    onZoneMotionUpdate(zoneId, motion) {
      router.update(zoneId, motion);
    },
  });

  if (started.isErr()) {
    logOperationFailed(log, "integration setup", new Error(started.error.message));
    zones.clear();
    return err(started.error);
  }

  current = {
    sessionId: naming.sessionId,
    broker,
    topics,
    gateway,
    zones,
    router,
    entities,
    devices,
    hub,
  };

  logOperationComplete(log, "integration setup", startTime, {
    connected: gateway.connected,
  });
  return ok(current);
}

/**
 * Stop the gateway and discard the known-zone table. Waits for a setup in
 * progress; no-op when nothing is set up.
 */
export async function unloadIntegration(): Promise<void> {
  if (starting) await starting;

  const integration = current;
  if (!integration) return;
  current = null;

  const startTime = Date.now();
  logOperationStart(log, "integration unload", {
    sessionId: integration.sessionId,
  });

  await integration.gateway.stop();
  integration.zones.clear();

  logOperationComplete(log, "integration unload", startTime);
}
