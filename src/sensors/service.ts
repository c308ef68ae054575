/**
 * Sensors Module - Service Layer
 *
 * The motion sensor handle. State lives in a closure; callers change it
 * only through the handle's methods.
 */
import { createLogger } from "../logger.js";
import type { ZoneInfo } from "../zone-state/index.js";
import type {
  DeviceInfo,
  SensorNaming,
  SensorSnapshot,
  SensorStatePublisher,
  ZoneMotionSensor,
} from "./schema.js";
import { buildDeviceInfo, sensorUniqueId } from "./transform.js";

const log = createLogger("sensors");

/**
 * Create the motion sensor handle for a zone.
 */
export function createZoneMotionSensor(
  zone: ZoneInfo,
  naming: SensorNaming,
): ZoneMotionSensor {
  const uniqueId = sensorUniqueId(naming.sessionId, zone.id);
  const zoneId = zone.id;

  let name = zone.name;
  let device: DeviceInfo = buildDeviceInfo(naming, zone);
  let motion: boolean | null = null;
  let publisher: SensorStatePublisher | null = null;

  const snapshot = (): SensorSnapshot => ({
    uniqueId,
    zoneId,
    name,
    motion,
    device,
  });

  const publishState = (): void => {
    if (!publisher) return;
    publisher(snapshot());
  };

  return {
    uniqueId,
    zoneId,
    name: () => name,
    deviceInfo: () => device,
    currentState: () => motion,
    snapshot,

    applyMotion(next) {
      motion = next;
      log.debug({ zoneId, motion: next, attached: publisher !== null }, "Motion state changed");
      publishState();
    },

    publishState,

    setName(next) {
      name = next;
    },

    setDeviceInfo(next) {
      device = next;
    },

    attach(next) {
      publisher = next;
      publishState();
    },

    detach() {
      publisher = null;
    },

    isAttached: () => publisher !== null,
  };
}
