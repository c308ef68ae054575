/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting of zone state to presentation clients.
 */
import { createLogger } from "../logger.js";
import type { SensorSnapshot } from "../sensors/index.js";
import type { SseEvent, ZoneStateEvent } from "./schema.js";

const log = createLogger("sse");

const encoder = new TextEncoder();

function encodeEvent(type: string, data: unknown): Uint8Array {
  return encoder.encode(`event: ${type}\ndata: ${JSON.stringify(data)}\n\n`);
}

// =============================================================================
// Client Management
// =============================================================================

/**
 * SSE client connection.
 */
type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

let clients: SseClient[] = [];
let nextClientId = 1;

/**
 * Get count of connected clients.
 */
export function getClientCount(): number {
  return clients.filter((c) => c.connected).length;
}

/**
 * Create a new SSE stream for a client.
 *
 * @returns ReadableStream for the response and the client's id
 */
export function createSseStream(): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;
  let client: SseClient | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      client = {
        id: clientId,
        controller,
        connected: true,
      };
      clients.push(client);
      log.info(
        { clientId, totalClients: getClientCount() },
        "SSE client connected",
      );

      controller.enqueue(encodeEvent("connected", { clientId }));
    },
    cancel() {
      if (client) {
        client.connected = false;
        clients = clients.filter((c) => c.id !== clientId);
        log.info(
          { clientId, remainingClients: getClientCount() },
          "SSE client disconnected",
        );
      }
    },
  });

  return { stream, clientId };
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients.
 */
export function broadcast(event: SseEvent): void {
  const connectedClients = clients.filter((c) => c.connected);

  if (connectedClients.length === 0) {
    log.debug({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encodeEvent(event.type, event);

  let successCount = 0;
  let errorCount = 0;

  for (const client of connectedClients) {
    try {
      client.controller.enqueue(data);
      successCount++;
    } catch {
      // Stream already closed by the client
      client.connected = false;
      errorCount++;
    }
  }

  if (errorCount > 0) {
    clients = clients.filter((c) => c.connected);
    log.debug(
      { eventType: event.type, sent: successCount, failed: errorCount },
      "Broadcast complete with disconnections",
    );
  }

  log.debug(
    { eventType: event.type, clients: successCount },
    "Event broadcasted",
  );
}

/**
 * Zone state event from a sensor snapshot.
 */
export function toZoneStateEvent(snapshot: SensorSnapshot): ZoneStateEvent {
  return {
    type: "zone_state",
    zoneId: snapshot.zoneId,
    name: snapshot.name,
    motion: snapshot.motion,
  };
}

/**
 * Broadcast a zone's current state. Used as the sensor state publisher.
 */
export function broadcastZoneState(snapshot: SensorSnapshot): void {
  broadcast(toZoneStateEvent(snapshot));
}

/**
 * Broadcast that a zone was removed.
 */
export function broadcastZoneRemoved(zoneId: string): void {
  broadcast({ type: "zone_removed", zoneId });
}

/**
 * Broadcast broker connection status.
 */
export function broadcastConnection(connected: boolean): void {
  broadcast({ type: "connection", connected });
}

/**
 * Send event to a specific client.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  const client = clients.find((c) => c.id === clientId && c.connected);
  if (!client) return false;

  try {
    client.controller.enqueue(encodeEvent(event.type, event));
    return true;
  } catch {
    client.connected = false;
    return false;
  }
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Disconnect all clients (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

  for (const client of clients) {
    try {
      client.controller.close();
    } catch {
      // Already closed
    }
  }

  clients = [];
}
