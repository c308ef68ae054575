/**
 * Registry Module - Public API
 */

// Types
export type {
  DeviceTemplate,
  EntityPlatformOptions,
  InMemoryDeviceRegistry,
  InMemoryEntityRegistry,
} from "./schema.js";

// Service functions
export {
  createDeviceRegistry,
  createEntityPlatform,
  createEntityRegistry,
  ensureHubDevice,
} from "./service.js";

// Pure transformations
export { allocateEntityId, slugify } from "./transform.js";
