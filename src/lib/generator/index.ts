/**
 * Generator module - per-collection records and their combination
 */
export * from "./record-generator.js";
export * from "./combined.js";
