/**
 * Integration Module - Public API
 */

// Types
export type { Integration, IntegrationError, SetupOptions } from "./schema.js";

// Service functions
export {
  getIntegration,
  setupIntegration,
  unloadIntegration,
} from "./service.js";
