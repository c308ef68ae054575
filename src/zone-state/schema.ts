/**
 * Zone State Module - Schemas and Types
 *
 * Defines the data shapes for zone-state broker messages.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Zone Roster
// =============================================================================

/**
 * One zone as reported by the upstream device.
 * Both fields are mandatory; partial entries reject the whole message.
 */
export const ZoneInfoSchema = z.object({
  id: z.string().describe("Stable, broker-assigned zone id"),
  name: z.string().describe("Human label, may change between rosters"),
});

export type ZoneInfo = Readonly<z.infer<typeof ZoneInfoSchema>>;

// =============================================================================
// Zone State Message
// =============================================================================

/**
 * Raw zone-state message.
 * Topics: /topic/zone-config, /topic/zone-state
 *
 * `motion` only has to be present; unknown literals are mapped later.
 */
export const ZoneStateMessageSchema = z.object({
  zoneId: z.string().describe("Zone the motion value belongs to"),
  motion: z
    .unknown()
    .refine((value) => value !== undefined, { message: "Required" })
    .describe("detected | holding | clear"),
  zones: z.array(ZoneInfoSchema).describe("Complete current roster"),
});

export type ZoneStateMessage = z.infer<typeof ZoneStateMessageSchema>;

/**
 * Motion literals the device is known to send.
 */
export const MOTION_LITERALS = ["detected", "holding", "clear"] as const;

export type MotionLiteral = (typeof MOTION_LITERALS)[number];

// =============================================================================
// Decoded Event
// =============================================================================

/**
 * Motion value for one zone.
 */
export type MotionEvent = Readonly<{
  zoneId: string;
  motion: boolean;
}>;

/**
 * A fully decoded zone-state message.
 */
export type ZoneStateEvent = Readonly<{
  roster: ReadonlyArray<ZoneInfo>;
  motion: MotionEvent;
  /** false when the raw literal was not one of MOTION_LITERALS */
  motionRecognised: boolean;
  rawMotion: unknown;
}>;

/**
 * Consumers of decoded events. Roster is always delivered before motion.
 */
export type ZoneStateCallbacks = Readonly<{
  onZoneConfigUpdate: (roster: ReadonlyArray<ZoneInfo>) => void | Promise<void>;
  onZoneMotionUpdate: (zoneId: string, motion: boolean) => void | Promise<void>;
}>;
