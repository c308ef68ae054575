/**
 * Sensors Module - Public API
 */

// Types
export type {
  DeviceInfo,
  SensorNaming,
  SensorSnapshot,
  SensorStatePublisher,
  ZoneMotionSensor,
} from "./schema.js";

// Service functions
export { createZoneMotionSensor } from "./service.js";

// Pure transformations
export {
  buildDeviceInfo,
  deviceDisplayName,
  hubDeviceIdentifier,
  sensorUniqueId,
  zoneDeviceIdentifier,
} from "./transform.js";
