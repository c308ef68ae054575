/**
 * Motion Module - Service Layer
 *
 * Routes motion values to zone sensors. Reads the known-zone table, never
 * adds or removes records.
 */
import { createLogger } from "../logger.js";
import type { ZoneLookup } from "../zones/index.js";
import type { MotionRouter } from "./schema.js";
import { shouldDeliverMotion } from "./transform.js";

const log = createLogger("motion");

/**
 * Create a motion router over the known-zone table.
 */
export function createMotionRouter(zones: ZoneLookup): MotionRouter {
  return {
    update(zoneId, motion) {
      const record = zones.getZone(zoneId);
      if (!record) {
        log.debug({ zoneId, motion }, "Motion for unknown zone dropped");
        return "unknown_zone";
      }

      if (!shouldDeliverMotion(record.sensor.currentState(), motion)) {
        return "unchanged";
      }

      record.sensor.applyMotion(motion);
      log.info({ zoneId, motion }, `Zone ${zoneId} motion ${motion ? "detected" : "clear"}`);
      return "notified";
    },
  };
}
