/**
 * API Routes
 *
 * - /api/health - Health check with broker status
 * - /api/version - App version
 * - /api/zones - Known zones and their motion state
 * - /api/events - SSE stream of zone updates
 */
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import { getIntegration } from "../integration/index.js";
import {
  createSseStream,
  getClientCount,
  sendToClient,
  toZoneStateEvent,
} from "../sse/index.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

export const routes = new Hono();

// =============================================================================
// Health Check
// =============================================================================

/**
 * Health check. `degraded` while the broker session is down,
 * `not_configured` when no integration is running.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  const integration = getIntegration();
  const connected = integration?.gateway.connected ?? false;

  return c.json({
    status: !integration ? "not_configured" : connected ? "ok" : "degraded",
    timestamp: new Date().toISOString(),
    requestId,
    version: APP_VERSION,
    broker: integration
      ? {
          host: integration.broker.host,
          port: integration.broker.port,
          connected,
        }
      : null,
    zones: integration?.zones.listZones().length ?? 0,
    sseClients: getClientCount(),
  });
});

routes.get("/api/version", (c) => {
  return c.json({ version: APP_VERSION });
});

// =============================================================================
// Zones
// =============================================================================

routes.get("/api/zones", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "GET /api/zones");

  const records = getIntegration()?.zones.listZones() ?? [];

  return c.json({
    zones: records.map((record) => ({
      id: record.info.id,
      name: record.info.name,
      motion: record.sensor.currentState(),
    })),
  });
});

// =============================================================================
// Server-Sent Events Stream
// =============================================================================

/**
 * SSE endpoint. New clients first receive the broker status and the
 * state of every known zone.
 */
routes.get("/api/events", (c) => {
  const requestId = c.get("requestId");
  const { stream, clientId } = createSseStream();

  log.info({ requestId, clientId }, "SSE client connected");

  const integration = getIntegration();
  if (integration) {
    sendToClient(clientId, {
      type: "connection",
      connected: integration.gateway.connected,
    });
    for (const record of integration.zones.listZones()) {
      sendToClient(clientId, toZoneStateEvent(record.sensor.snapshot()));
    }
  }

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
});
