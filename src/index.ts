/**
 * Zone Motion Bridge - Application Entry Point
 *
 * Sets up the integration (broker pipeline and host environment), then
 * serves the HTTP API and SSE stream. Exits non-zero when setup fails.
 */
import { serve } from "@hono/node-server";

import { createApp } from "./app.js";
import { config } from "./config.js";
import { setupIntegration, unloadIntegration } from "./integration/index.js";
import { createLogger } from "./logger.js";
import { disconnectAllClients } from "./sse/index.js";

const log = createLogger("api");

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    broker: config.BROKER_HOST
      ? `${config.BROKER_HOST}:${config.MQTT_PORT ?? "?"}`
      : null,
    sessionId: config.SESSION_ID,
    topics: [config.MQTT_TOPIC_ZONE_CONFIG, config.MQTT_TOPIC_ZONE_STATE],
  },
  "Configuration loaded",
);

// =============================================================================
// INTEGRATION SETUP
// =============================================================================

const setup = await setupIntegration();

if (setup.isErr()) {
  // Already logged with details by the integration module
  process.exit(1);
}

// =============================================================================
// HTTP SERVER
// =============================================================================

const app = createApp();

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  disconnectAllClients();
  await unloadIntegration();
  server.close();

  log.info("Shutdown complete");
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    log.error({ error }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
