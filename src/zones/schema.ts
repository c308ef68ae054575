/**
 * Zones Module - Schemas and Types
 *
 * The known-zone table and the host collaborators the reconciler drives.
 */
import type { SensorNaming, ZoneMotionSensor } from "../sensors/index.js";
import type { ZoneInfo } from "../zone-state/index.js";
import type { ZoneError } from "./errors.js";

export type MaybePromise<T> = T | Promise<T>;

// =============================================================================
// Known-Zone Table
// =============================================================================

/**
 * One known zone. Motion lives in the sensor handle (`currentState()`).
 */
export type ZoneRecord = Readonly<{
  info: ZoneInfo;
  sensor: ZoneMotionSensor;
}>;

/**
 * Read access to the known-zone table.
 */
export type ZoneLookup = {
  getZone(zoneId: string): ZoneRecord | undefined;
};

// =============================================================================
// Host Collaborators
// =============================================================================

/**
 * Registry entry of a presentation-layer entity.
 */
export type EntityEntry = Readonly<{
  entityId: string;
  uniqueId: string;
  sessionId: string;
  /** Label set by a user; null means the label is derived from the zone */
  nameOverride: string | null;
}>;

/**
 * Registry entry of a device.
 */
export type DeviceEntry = Readonly<{
  id: string;
  name: string;
  sessionId: string;
  identifiers: ReadonlyArray<string>;
  viaDevice: string | null;
}>;

/**
 * Registers new sensor entities with the presentation layer.
 */
export type EntityPlatform = {
  addEntities(batch: ReadonlyArray<ZoneMotionSensor>): MaybePromise<void>;
};

export type EntityRegistry = {
  lookupByUniqueId(uniqueId: string): MaybePromise<EntityEntry | undefined>;
  remove(entityId: string): MaybePromise<void>;
  clearNameOverride(entityId: string): MaybePromise<void>;
};

export type DeviceRegistry = {
  lookupByIdentifier(identifier: string): MaybePromise<DeviceEntry | undefined>;
  remove(deviceId: string): MaybePromise<void>;
  updateName(deviceId: string, name: string): MaybePromise<void>;
};

export type ZoneManagerOptions = Readonly<{
  naming: SensorNaming;
  entities: EntityRegistry;
  devices: DeviceRegistry;
  /** Usually attached later, once the presentation layer is ready */
  platform?: EntityPlatform | null;
}>;

// =============================================================================
// Reconciliation Result
// =============================================================================

/**
 * What one roster update did. Ids are listed in processing order.
 */
export type ReconcileSummary = Readonly<{
  added: ReadonlyArray<string>;
  removed: ReadonlyArray<string>;
  renamed: ReadonlyArray<string>;
  failures: ReadonlyArray<ZoneError>;
}>;

/**
 * Roster diff against the known-zone table.
 */
export type RosterDiff = Readonly<{
  added: ReadonlyArray<ZoneInfo>;
  removed: ReadonlyArray<string>;
  renamed: ReadonlyArray<ZoneInfo>;
}>;

export type ZoneManager = ZoneLookup & {
  /** Reconcile the table against a complete roster. */
  update(roster: ReadonlyArray<ZoneInfo>): Promise<ReconcileSummary>;
  listZones(): ReadonlyArray<ZoneRecord>;
  /** The roster applied by the most recent update. */
  rosterSnapshot(): ReadonlyArray<ZoneInfo>;
  setEntityPlatform(platform: EntityPlatform | null): void;
  /** Detach every sensor and forget all zones. */
  clear(): void;
};
