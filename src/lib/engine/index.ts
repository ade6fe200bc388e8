/**
 * Engine module - pulls records through burst scheduling and rate limiting
 */
export * from "./engine.js";
export * from "./stream.js";
