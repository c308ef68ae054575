/**
 * Registry Module - Schemas and Types
 *
 * The in-memory host environment behind the reconciler's collaborator
 * contracts: an entity registry, a device registry and the entity platform.
 */
import type { SensorStatePublisher } from "../sensors/index.js";
import type {
  DeviceEntry,
  DeviceRegistry,
  EntityEntry,
  EntityRegistry,
} from "../zones/index.js";

/**
 * Everything needed to create or find a device.
 */
export type DeviceTemplate = Readonly<{
  identifier: string;
  name: string;
  sessionId: string;
  viaDevice: string | null;
}>;

/**
 * Synchronous entity registry; lookups resolve immediately.
 */
export type InMemoryEntityRegistry = Omit<EntityRegistry, "lookupByUniqueId"> & {
  lookupByUniqueId(uniqueId: string): EntityEntry | undefined;
  /** The entity id is derived from `suggestedName`. */
  register(entry: Omit<EntityEntry, "entityId">, suggestedName: string): EntityEntry;
  /** User action: set a custom label. */
  setNameOverride(entityId: string, name: string): void;
  list(): ReadonlyArray<EntityEntry>;
};

export type InMemoryDeviceRegistry = Omit<DeviceRegistry, "lookupByIdentifier"> & {
  lookupByIdentifier(identifier: string): DeviceEntry | undefined;
  /** Returns the existing device for the identifier or creates one. */
  getOrCreate(template: DeviceTemplate): DeviceEntry;
  list(): ReadonlyArray<DeviceEntry>;
};

export type EntityPlatformOptions = Readonly<{
  sessionId: string;
  entities: InMemoryEntityRegistry;
  devices: InMemoryDeviceRegistry;
  /** Receives every state a registered sensor publishes. */
  publisher: SensorStatePublisher;
}>;

