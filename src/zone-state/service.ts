/**
 * Zone State Module - Service Layer
 *
 * Turns raw zone-state payloads into roster and motion callbacks.
 * Malformed input is logged and dropped; it never throws.
 */
import type { Result } from "neverthrow";

import { createLogger } from "../logger.js";
import { type ZoneStateError, formatZoneStateError } from "./errors.js";
import type { ZoneStateCallbacks, ZoneStateEvent } from "./schema.js";
import { decodeZoneState } from "./transform.js";

const log = createLogger("zone-state");

/**
 * Zone-state message handler, as registered on the transport.
 */
export type ZoneStateHandler = (
  payload: unknown,
  topic: string,
) => Promise<Result<ZoneStateEvent, ZoneStateError>>;

/**
 * Create a handler that decodes each payload and forwards it.
 *
 * Roster first, then motion: a motion value for a zone that first appears in
 * the same message must find the handle the roster update just created.
 */
export function createZoneStateHandler(
  callbacks: ZoneStateCallbacks,
): ZoneStateHandler {
  return async (payload, topic) => {
    const decoded = decodeZoneState(payload);

    if (decoded.isErr()) {
      const error = decoded.error;
      log.warn(
        {
          topic,
          error: error.type,
          data: error.type === "INVALID_SHAPE" ? error.data : error.payload,
        },
        formatZoneStateError(error),
      );
      return decoded;
    }

    const event = decoded.value;

    if (!event.motionRecognised) {
      log.warn(
        { topic, zoneId: event.motion.zoneId, motion: event.rawMotion },
        `Unknown or missing motion state for zone ${event.motion.zoneId}, defaulting to false`,
      );
    }

    log.debug(
      {
        topic,
        zoneId: event.motion.zoneId,
        motion: event.motion.motion,
        zones: event.roster.length,
      },
      "Zone state received",
    );

    await callbacks.onZoneConfigUpdate(event.roster);
    await callbacks.onZoneMotionUpdate(event.motion.zoneId, event.motion.motion);

    return decoded;
  };
}
