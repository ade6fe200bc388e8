/**
 * Synthesizer module - field values and payloads
 */
export * from "./field-values.js";
export * from "./payload.js";
