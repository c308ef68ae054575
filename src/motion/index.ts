/**
 * Motion Module - Public API
 */

// Types
export type { MotionOutcome, MotionRouter } from "./schema.js";

// Service functions
export { createMotionRouter } from "./service.js";

// Pure transformations
export { shouldDeliverMotion } from "./transform.js";
