/**
 * Zone State Module - Public API
 *
 * Decoder for zone-state broker messages.
 */

// Types
export type {
  MotionEvent,
  MotionLiteral,
  ZoneInfo,
  ZoneStateCallbacks,
  ZoneStateEvent,
  ZoneStateMessage,
} from "./schema.js";
export type { ZoneStateError } from "./errors.js";
export type { ZoneStateHandler } from "./service.js";

export { MOTION_LITERALS, ZoneInfoSchema } from "./schema.js";

// Error utilities
export { formatZoneStateError } from "./errors.js";

// Service functions
export { createZoneStateHandler } from "./service.js";

// Pure transformations
export {
  decodeZoneState,
  mapMotionLiteral,
  parseJsonPayload,
  payloadToText,
} from "./transform.js";
