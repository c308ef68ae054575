/**
 * Motion Module - Schemas and Types
 */

/**
 * What a single motion update did.
 * - unknown_zone: no record for the id (never seen or already removed)
 * - unchanged: equal to the stored state, dropped
 * - notified: state stored and the sensor notified once
 */
export type MotionOutcome = "unknown_zone" | "unchanged" | "notified";

export type MotionRouter = {
  update(zoneId: string, motion: boolean): MotionOutcome;
};
