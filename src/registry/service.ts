/**
 * Registry Module - Service Layer
 *
 * In-memory entity and device registries, the entity platform that
 * registers zone sensors with them, and the hub device.
 */
import { createLogger } from "../logger.js";
import {
  type ZoneMotionSensor,
  hubDeviceIdentifier,
} from "../sensors/index.js";
import type { DeviceEntry, EntityEntry, EntityPlatform } from "../zones/index.js";
import type {
  DeviceTemplate,
  EntityPlatformOptions,
  InMemoryDeviceRegistry,
  InMemoryEntityRegistry,
} from "./schema.js";
import { allocateEntityId } from "./transform.js";

const log = createLogger("registry");

// =============================================================================
// Entity Registry
// =============================================================================

export function createEntityRegistry(): InMemoryEntityRegistry {
  // Keyed by entity id
  const entries = new Map<string, EntityEntry>();

  const findByUniqueId = (uniqueId: string): EntityEntry | undefined =>
    [...entries.values()].find((entry) => entry.uniqueId === uniqueId);

  return {
    register(entry, suggestedName) {
      if (findByUniqueId(entry.uniqueId)) {
        throw new Error(`Entity already registered: ${entry.uniqueId}`);
      }
      const entityId = allocateEntityId(suggestedName, (id) => entries.has(id));
      const created: EntityEntry = { ...entry, entityId };
      entries.set(entityId, created);
      log.debug({ entityId, uniqueId: entry.uniqueId }, "Entity registered");
      return created;
    },

    lookupByUniqueId: findByUniqueId,

    remove(entityId) {
      if (entries.delete(entityId)) {
        log.debug({ entityId }, "Entity removed");
      }
    },

    clearNameOverride(entityId) {
      const entry = entries.get(entityId);
      if (entry) entries.set(entityId, { ...entry, nameOverride: null });
    },

    setNameOverride(entityId, name) {
      const entry = entries.get(entityId);
      if (!entry) throw new Error(`Unknown entity: ${entityId}`);
      entries.set(entityId, { ...entry, nameOverride: name });
    },

    list: () => [...entries.values()],
  };
}

// =============================================================================
// Device Registry
// =============================================================================

export function createDeviceRegistry(): InMemoryDeviceRegistry {
  // Keyed by device id
  const entries = new Map<string, DeviceEntry>();

  const findByIdentifier = (identifier: string): DeviceEntry | undefined =>
    [...entries.values()].find((entry) => entry.identifiers.includes(identifier));

  return {
    getOrCreate(template: DeviceTemplate) {
      const existing = findByIdentifier(template.identifier);
      if (existing) return existing;

      const created: DeviceEntry = {
        id: crypto.randomUUID(),
        name: template.name,
        sessionId: template.sessionId,
        identifiers: [template.identifier],
        viaDevice: template.viaDevice,
      };
      entries.set(created.id, created);
      log.debug({ deviceId: created.id, identifier: template.identifier }, "Device created");
      return created;
    },

    lookupByIdentifier: findByIdentifier,

    remove(deviceId) {
      if (entries.delete(deviceId)) {
        log.debug({ deviceId }, "Device removed");
      }
    },

    updateName(deviceId, name) {
      const entry = entries.get(deviceId);
      if (!entry) throw new Error(`Unknown device: ${deviceId}`);
      entries.set(deviceId, { ...entry, name });
    },

    list: () => [...entries.values()],
  };
}

// =============================================================================
// Hub Device
// =============================================================================

/**
 * Create (or find) the hub device every zone device hangs off.
 */
export function ensureHubDevice(
  devices: InMemoryDeviceRegistry,
  naming: Readonly<{ sessionId: string; hubName: string }>,
): DeviceEntry {
  return devices.getOrCreate({
    identifier: hubDeviceIdentifier(naming.sessionId),
    name: naming.hubName,
    sessionId: naming.sessionId,
    viaDevice: null,
  });
}

// =============================================================================
// Entity Platform
// =============================================================================

/**
 * Registers each sensor's entity and device, then attaches the publisher.
 * A batch is checked before anything is registered.
 */
export function createEntityPlatform(
  options: EntityPlatformOptions,
): EntityPlatform {
  const { sessionId, entities, devices, publisher } = options;

  return {
    addEntities(batch: ReadonlyArray<ZoneMotionSensor>) {
      const duplicate = batch.find(
        (sensor) => entities.lookupByUniqueId(sensor.uniqueId) !== undefined,
      );
      if (duplicate) {
        throw new Error(`Entity already registered: ${duplicate.uniqueId}`);
      }

      for (const sensor of batch) {
        const device = sensor.deviceInfo();
        devices.getOrCreate({
          identifier: device.identifier,
          name: device.name,
          sessionId,
          viaDevice: device.viaDevice,
        });
        entities.register(
          { uniqueId: sensor.uniqueId, sessionId, nameOverride: null },
          sensor.name(),
        );
        sensor.attach(publisher);
      }

      log.info({ count: batch.length }, `Registered ${batch.length} zone sensors`);
    },
  };
}
