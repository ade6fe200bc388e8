/**
 * Schema module - payload schemas attached to generated records
 */
export * from "./types.js";
export * from "./json-schema.js";
export * from "./registry.js";
export * from "./attacher.js";
