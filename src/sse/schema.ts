/**
 * SSE Module - Schemas and Types
 *
 * Events pushed to presentation clients.
 */

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Current state of one zone. `motion` is null until the first motion event.
 */
export type ZoneStateEvent = Readonly<{
  type: "zone_state";
  zoneId: string;
  name: string;
  motion: boolean | null;
}>;

/**
 * A zone left the roster.
 */
export type ZoneRemovedEvent = Readonly<{
  type: "zone_removed";
  zoneId: string;
}>;

/**
 * Broker connection status event.
 */
export type ConnectionEvent = Readonly<{
  type: "connection";
  connected: boolean;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent = ZoneStateEvent | ZoneRemovedEvent | ConnectionEvent;
