/**
 * burstgen: synthetic change record generation with burst windows,
 * rate limiting and multi-collection fan-out
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/synthesizer/index.js";
export * from "./lib/generator/index.js";
export * from "./lib/scheduler/index.js";
export * from "./lib/engine/index.js";
export * from "./lib/schema/index.js";
export * from "./lib/config/index.js";
export * from "./lib/emitter/index.js";
export { RateLimiter, resolveRateLimit } from "./lib/utils/rate-limiter.js";
export { sleep, waitForAbort, throwIfCancelled } from "./lib/utils/abort.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/duration.js";
export * from "./utils/seed-manager.js";
