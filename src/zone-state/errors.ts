/**
 * Zone State Module - Error Types
 *
 * Decode failures are values, never exceptions. Every variant is
 * recoverable: the message is dropped and the pipeline continues.
 */
import type { ZodIssue } from "zod";

export type ZoneStateError =
  | {
      readonly type: "INVALID_JSON";
      readonly message: string;
      readonly payload: string;
    }
  | {
      readonly type: "INVALID_SHAPE";
      readonly message: string;
      readonly issues: ReadonlyArray<ZodIssue>;
      readonly data: unknown;
    };

/**
 * Create an INVALID_JSON error.
 */
export const invalidJson = (
  payload: string,
  message: string,
): ZoneStateError => ({
  type: "INVALID_JSON",
  message,
  payload,
});

/**
 * Create an INVALID_SHAPE error.
 */
export const invalidShape = (
  data: unknown,
  issues: ReadonlyArray<ZodIssue>,
): ZoneStateError => ({
  type: "INVALID_SHAPE",
  message: issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; "),
  issues,
  data,
});

/**
 * Format a ZoneStateError for logging.
 */
export function formatZoneStateError(error: ZoneStateError): string {
  switch (error.type) {
    case "INVALID_JSON":
      return `Non-JSON payload: ${error.message}`;
    case "INVALID_SHAPE":
      return `Unexpected message format: ${error.message}`;
  }
}
