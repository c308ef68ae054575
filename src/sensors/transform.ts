/**
 * Sensors Module - Pure Transformations
 *
 * Derived identifiers and names. Every identifier is a function of the
 * session id and the zone id, so removal can find what creation made.
 */
import type { ZoneInfo } from "../zone-state/index.js";
import type { DeviceInfo, SensorNaming } from "./schema.js";

/**
 * Unique id of a zone's motion entity: `<sessionId>_zone_<zoneId>_motion`.
 */
export function sensorUniqueId(sessionId: string, zoneId: string): string {
  return `${sessionId}_zone_${zoneId}_motion`;
}

/**
 * Device identifier of the hub. Shares the registry namespace with zones.
 */
export function hubDeviceIdentifier(sessionId: string): string {
  return sessionId;
}

/**
 * Device identifier of a zone: `<sessionId>_<zoneId>`.
 */
export function zoneDeviceIdentifier(sessionId: string, zoneId: string): string {
  return `${sessionId}_${zoneId}`;
}

/**
 * Display name of a zone device, e.g. "Zone (Hallway)".
 */
export function deviceDisplayName(prefix: string, zoneName: string): string {
  return `${prefix} (${zoneName})`;
}

/**
 * Device info for a zone's sensor.
 */
export function buildDeviceInfo(
  naming: SensorNaming,
  zone: ZoneInfo,
): DeviceInfo {
  return {
    identifier: zoneDeviceIdentifier(naming.sessionId, zone.id),
    name: deviceDisplayName(naming.deviceNamePrefix, zone.name),
    viaDevice: hubDeviceIdentifier(naming.sessionId),
  };
}
