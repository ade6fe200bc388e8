/**
 * Emitter module - output formats for generated records
 */
export * from "./types.js";
export * from "./record-serializer.js";
export * from "./ndjson-writer.js";
export * from "./json-writer.js";
export * from "./emit.js";
