/**
 * Gateway Module - Error Types
 */
import type { TransportError } from "../mqtt/index.js";

export type GatewayError =
  | TransportError
  | {
      readonly type: "ALREADY_STARTED";
      readonly message: string;
    };

export function alreadyStarted(): GatewayError {
  return {
    type: "ALREADY_STARTED",
    message: "Gateway already started",
  };
}
