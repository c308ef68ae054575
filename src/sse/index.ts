/**
 * SSE Module - Public API
 */

// Types
export type {
  ConnectionEvent,
  SseEvent,
  ZoneRemovedEvent,
  ZoneStateEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastConnection,
  broadcastZoneRemoved,
  broadcastZoneState,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  sendToClient,
  toZoneStateEvent,
} from "./service.js";
