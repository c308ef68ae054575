/**
 * Zones Module - Service Layer
 *
 * Owns the known-zone table and reconciles it against each roster:
 * added zones are created, missing zones removed, renamed zones updated,
 * in that order. Collaborator failures are isolated per zone.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  buildDeviceInfo,
  createZoneMotionSensor,
  deviceDisplayName,
  hubDeviceIdentifier,
  sensorUniqueId,
  zoneDeviceIdentifier,
} from "../sensors/index.js";
import type { ZoneInfo } from "../zone-state/index.js";
import {
  type RegistryOperation,
  type ZoneError,
  formatZoneError,
  platformFailed,
  platformUnavailable,
  registryFailed,
} from "./errors.js";
import type {
  DeviceEntry,
  EntityPlatform,
  MaybePromise,
  ReconcileSummary,
  ZoneManager,
  ZoneManagerOptions,
  ZoneRecord,
} from "./schema.js";
import { dedupeRoster, diffRoster, isEmptyDiff } from "./transform.js";

const log = createLogger("zones");

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run one registry call for one zone, turning a throw into a ZoneError.
 */
async function attempt<T>(
  zoneId: string,
  operation: RegistryOperation,
  fn: () => MaybePromise<T>,
): Promise<Result<T, ZoneError>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(registryFailed(zoneId, operation, toError(error)));
  }
}

/**
 * Create the zone manager (reconciler) for one config session.
 */
export function createZoneManager(options: ZoneManagerOptions): ZoneManager {
  const { naming, entities, devices } = options;
  const hubIdentifier = hubDeviceIdentifier(naming.sessionId);

  const records = new Map<string, ZoneRecord>();
  let snapshot: ReadonlyArray<ZoneInfo> = [];
  let platform: EntityPlatform | null = options.platform ?? null;

  const isHubDevice = (device: DeviceEntry): boolean =>
    device.identifiers.includes(hubIdentifier);

  // ===========================================================================
  // Lifecycle Operations
  // ===========================================================================

  async function createZones(
    zones: ReadonlyArray<ZoneInfo>,
    failures: ZoneError[],
  ): Promise<string[]> {
    const zoneIds = zones.map((zone) => zone.id);

    if (!platform) {
      const error = platformUnavailable(zoneIds);
      log.warn({ zoneIds }, formatZoneError(error));
      failures.push(error);
      return [];
    }

    const sensors = zones.map((zone) => createZoneMotionSensor(zone, naming));

    try {
      await platform.addEntities(sensors);
    } catch (error) {
      const failure = platformFailed(zoneIds, toError(error));
      log.error({ zoneIds, error: failure.message }, formatZoneError(failure));
      failures.push(failure);
      return [];
    }

    zones.forEach((zone, index) => {
      const sensor = sensors[index];
      if (sensor) records.set(zone.id, { info: zone, sensor });
    });

    log.info({ zoneIds }, `Created ${sensors.length} new zone entities`);
    return zoneIds;
  }

  async function removeZone(
    zoneId: string,
    failures: ZoneError[],
  ): Promise<void> {
    const record = records.get(zoneId);
    records.delete(zoneId);
    record?.sensor.detach();

    const uniqueId = sensorUniqueId(naming.sessionId, zoneId);
    const entityResult = await attempt(zoneId, "remove_entity", async () => {
      const entry = await entities.lookupByUniqueId(uniqueId);
      if (!entry || entry.sessionId !== naming.sessionId) return false;
      await entities.remove(entry.entityId);
      return true;
    });

    if (entityResult.isErr()) {
      log.error({ zoneId }, formatZoneError(entityResult.error));
      failures.push(entityResult.error);
    } else if (entityResult.value) {
      log.info({ zoneId }, `Removed entity for zone ${zoneId}`);
    }

    const identifier = zoneDeviceIdentifier(naming.sessionId, zoneId);
    const deviceResult = await attempt(zoneId, "remove_device", async () => {
      const device = await devices.lookupByIdentifier(identifier);
      if (!device || device.sessionId !== naming.sessionId) return false;
      if (isHubDevice(device)) {
        log.warn({ zoneId, deviceId: device.id }, "Refusing to remove hub device");
        return false;
      }
      await devices.remove(device.id);
      return true;
    });

    if (deviceResult.isErr()) {
      log.error({ zoneId }, formatZoneError(deviceResult.error));
      failures.push(deviceResult.error);
    } else if (deviceResult.value) {
      log.info({ zoneId }, `Removed device for zone ${zoneId}`);
    }
  }

  async function renameZone(
    zone: ZoneInfo,
    failures: ZoneError[],
  ): Promise<void> {
    const device = buildDeviceInfo(naming, zone);
    const expectedName = deviceDisplayName(naming.deviceNamePrefix, zone.name);

    const deviceResult = await attempt(zone.id, "rename_device", async () => {
      const entry = await devices.lookupByIdentifier(device.identifier);
      if (!entry || entry.name === expectedName) return false;
      await devices.updateName(entry.id, expectedName);
      return true;
    });

    if (deviceResult.isErr()) {
      log.error({ zoneId: zone.id }, formatZoneError(deviceResult.error));
      failures.push(deviceResult.error);
    } else if (deviceResult.value) {
      log.info(
        { zoneId: zone.id, name: zone.name },
        `Updated device name for zone ${zone.id} to ${zone.name}`,
      );
    }

    // The entity label is derived from the device; drop any stored override
    const uniqueId = sensorUniqueId(naming.sessionId, zone.id);
    const labelResult = await attempt(zone.id, "clear_entity_name", async () => {
      const entry = await entities.lookupByUniqueId(uniqueId);
      if (!entry || entry.nameOverride === null) return;
      await entities.clearNameOverride(entry.entityId);
    });

    if (labelResult.isErr()) {
      log.error({ zoneId: zone.id }, formatZoneError(labelResult.error));
      failures.push(labelResult.error);
    }

    const record = records.get(zone.id);
    if (!record) return;

    record.sensor.setName(zone.name);
    record.sensor.setDeviceInfo(device);
    records.set(zone.id, { info: zone, sensor: record.sensor });

    if (record.sensor.isAttached()) {
      record.sensor.publishState();
    }
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  return {
    async update(roster) {
      const { zones, duplicates } = dedupeRoster(roster);
      if (duplicates.length > 0) {
        log.warn({ zoneIds: duplicates }, "Roster lists zone ids more than once");
      }

      const known = new Map<string, string>();
      for (const [zoneId, record] of records) {
        known.set(zoneId, record.info.name);
      }

      const diff = diffRoster(known, zones);
      const failures: ZoneError[] = [];
      const removed: string[] = [];
      const renamed: string[] = [];

      const added =
        diff.added.length > 0 ? await createZones(diff.added, failures) : [];

      for (const zoneId of diff.removed) {
        await removeZone(zoneId, failures);
        removed.push(zoneId);
      }

      for (const zone of diff.renamed) {
        await renameZone(zone, failures);
        renamed.push(zone.id);
      }

      snapshot = [...zones.values()];

      if (!isEmptyDiff(diff)) {
        log.debug(
          { added, removed, renamed, failures: failures.length },
          "Roster reconciled",
        );
      }

      return { added, removed, renamed, failures };
    },

    getZone: (zoneId) => records.get(zoneId),

    listZones: () => [...records.values()],

    rosterSnapshot: () => snapshot,

    setEntityPlatform(next) {
      platform = next;
    },

    clear() {
      for (const record of records.values()) {
        record.sensor.detach();
      }
      log.info({ zones: records.size }, "Discarding known zones");
      records.clear();
      snapshot = [];
    },
  };
}
