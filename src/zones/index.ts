/**
 * Zones Module - Public API
 *
 * Zone reconciler and the collaborator contracts it consumes.
 */

// Types
export type {
  DeviceEntry,
  DeviceRegistry,
  EntityEntry,
  EntityPlatform,
  EntityRegistry,
  MaybePromise,
  ReconcileSummary,
  RosterDiff,
  ZoneLookup,
  ZoneManager,
  ZoneManagerOptions,
  ZoneRecord,
} from "./schema.js";
export type { RegistryOperation, ZoneError } from "./errors.js";

// Error utilities
export { formatZoneError } from "./errors.js";

// Service functions
export { createZoneManager } from "./service.js";

// Pure transformations
export { dedupeRoster, diffRoster, isEmptyDiff } from "./transform.js";
