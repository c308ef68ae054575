/**
 * Zones Module - Error Types
 *
 * Collaborator failures during reconciliation. They are collected per zone
 * and never abort the rest of an update.
 */

export type RegistryOperation =
  | "remove_entity"
  | "remove_device"
  | "rename_device"
  | "clear_entity_name";

export type ZoneError =
  | {
      readonly type: "PLATFORM_UNAVAILABLE";
      readonly zoneIds: ReadonlyArray<string>;
      readonly message: string;
    }
  | {
      readonly type: "PLATFORM_FAILED";
      readonly zoneIds: ReadonlyArray<string>;
      readonly message: string;
      readonly cause: Error;
    }
  | {
      readonly type: "REGISTRY_FAILED";
      readonly zoneId: string;
      readonly operation: RegistryOperation;
      readonly message: string;
      readonly cause: Error;
    };

/**
 * Create a PLATFORM_UNAVAILABLE error.
 */
export function platformUnavailable(zoneIds: ReadonlyArray<string>): ZoneError {
  return {
    type: "PLATFORM_UNAVAILABLE",
    zoneIds,
    message: "Cannot create entities - entity platform not attached",
  };
}

/**
 * Create a PLATFORM_FAILED error.
 */
export function platformFailed(
  zoneIds: ReadonlyArray<string>,
  cause: Error,
): ZoneError {
  return {
    type: "PLATFORM_FAILED",
    zoneIds,
    message: cause.message,
    cause,
  };
}

/**
 * Create a REGISTRY_FAILED error.
 */
export function registryFailed(
  zoneId: string,
  operation: RegistryOperation,
  cause: Error,
): ZoneError {
  return {
    type: "REGISTRY_FAILED",
    zoneId,
    operation,
    message: cause.message,
    cause,
  };
}

/**
 * Format a ZoneError for logging.
 */
export function formatZoneError(error: ZoneError): string {
  switch (error.type) {
    case "PLATFORM_UNAVAILABLE":
      return `${error.message} (${error.zoneIds.join(", ")})`;
    case "PLATFORM_FAILED":
      return `Entity registration failed for ${error.zoneIds.join(", ")}: ${error.message}`;
    case "REGISTRY_FAILED":
      return `${error.operation} failed for zone ${error.zoneId}: ${error.message}`;
  }
}
