/**
 * Gateway Module - Public API
 */

// Types
export type { Gateway, GatewayOptions } from "./schema.js";
export type { GatewayError } from "./errors.js";

// Service functions
export { createGateway } from "./service.js";
