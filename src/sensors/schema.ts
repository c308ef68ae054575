/**
 * Sensors Module - Schemas and Types
 *
 * Shapes of the per-zone motion sensor handle and what it publishes.
 */

// =============================================================================
// Device Info
// =============================================================================

/**
 * Device a zone sensor belongs to. Every zone gets its own device,
 * attached to the hub device through `viaDevice`.
 */
export type DeviceInfo = Readonly<{
  identifier: string;
  name: string;
  viaDevice: string;
}>;

/**
 * Naming inputs for derived identifiers.
 */
export type SensorNaming = Readonly<{
  sessionId: string;
  deviceNamePrefix: string;
}>;

// =============================================================================
// Sensor State
// =============================================================================

/**
 * Point-in-time view of one sensor, as handed to the presentation layer.
 * `motion` is null until the first motion event for the zone.
 */
export type SensorSnapshot = Readonly<{
  uniqueId: string;
  zoneId: string;
  name: string;
  motion: boolean | null;
  device: DeviceInfo;
}>;

/**
 * Notification hook installed by the presentation layer.
 */
export type SensorStatePublisher = (snapshot: SensorSnapshot) => void;

/**
 * Motion sensor handle for one zone.
 *
 * A plain value holder: it never polls, and it changes only through the
 * methods below.
 */
export type ZoneMotionSensor = {
  readonly uniqueId: string;
  readonly zoneId: string;
  name(): string;
  deviceInfo(): DeviceInfo;
  currentState(): boolean | null;
  snapshot(): SensorSnapshot;

  /** Record a new motion value and notify once. */
  applyMotion(motion: boolean): void;
  /** Re-send the current snapshot to the attached publisher, if any. */
  publishState(): void;

  setName(name: string): void;
  setDeviceInfo(device: DeviceInfo): void;

  attach(publisher: SensorStatePublisher): void;
  detach(): void;
  isAttached(): boolean;
};
