/**
 * MQTT Module - Error Types
 */

export type TransportError = {
  readonly type: "CONNECTION_FAILED";
  readonly host: string;
  readonly port: number;
  readonly message: string;
  readonly cause?: Error;
};

/**
 * Create a CONNECTION_FAILED error.
 */
export function connectionFailed(
  host: string,
  port: number,
  cause?: Error,
): TransportError {
  return {
    type: "CONNECTION_FAILED",
    host,
    port,
    message: `Cannot connect to MQTT broker ${host}:${port}${cause ? `: ${cause.message}` : ""}`,
    cause,
  };
}
