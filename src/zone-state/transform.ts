/**
 * Zone State Module - Pure Transformations
 *
 * Pure functions for decoding zone-state payloads.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import { type ZoneStateError, invalidJson, invalidShape } from "./errors.js";
import type { MotionLiteral, ZoneStateEvent } from "./schema.js";
import { MOTION_LITERALS, ZoneStateMessageSchema } from "./schema.js";

// =============================================================================
// Payload Decoding
// =============================================================================

/**
 * Decode a raw payload (Buffer or string) as UTF-8 text.
 *
 * @returns Text or null if the payload is neither
 */
export function payloadToText(payload: unknown): string | null {
  if (Buffer.isBuffer(payload)) {
    return payload.toString("utf-8");
  }
  if (typeof payload === "string") {
    return payload;
  }
  return null;
}

/**
 * Parse JSON from a Buffer or string payload.
 */
export function parseJsonPayload(
  payload: unknown,
): Result<unknown, ZoneStateError> {
  const text = payloadToText(payload);
  if (text === null) {
    return err(invalidJson(String(payload), "Payload is not text"));
  }

  try {
    const data: unknown = JSON.parse(text);
    return ok(data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(invalidJson(text, message));
  }
}

// =============================================================================
// Motion Mapping
// =============================================================================

function isMotionLiteral(value: unknown): value is MotionLiteral {
  return (
    typeof value === "string" &&
    (MOTION_LITERALS as ReadonlyArray<string>).includes(value)
  );
}

/**
 * Map a raw motion literal to a boolean.
 *
 * "detected" and "holding" mean motion; "clear" means none. Anything else
 * also maps to false, flagged as unrecognised so the caller can warn.
 */
export function mapMotionLiteral(value: unknown): {
  motion: boolean;
  recognised: boolean;
} {
  if (!isMotionLiteral(value)) {
    return { motion: false, recognised: false };
  }
  return { motion: value !== "clear", recognised: true };
}

// =============================================================================
// Zone State Decoding
// =============================================================================

/**
 * Decode a raw zone-state payload into a typed event.
 *
 * @param payload - Raw message payload (Buffer or string)
 * @returns Decoded event, or the reason the message must be dropped
 */
export function decodeZoneState(
  payload: unknown,
): Result<ZoneStateEvent, ZoneStateError> {
  return parseJsonPayload(payload).andThen((data) => {
    const parsed = ZoneStateMessageSchema.safeParse(data);
    if (!parsed.success) {
      return err(invalidShape(data, parsed.error.issues));
    }

    const msg = parsed.data;
    const { motion, recognised } = mapMotionLiteral(msg.motion);

    return ok({
      roster: msg.zones.map((zone) => ({ id: zone.id, name: zone.name })),
      motion: { zoneId: msg.zoneId, motion },
      motionRecognised: recognised,
      rawMotion: msg.motion,
    });
  });
}
