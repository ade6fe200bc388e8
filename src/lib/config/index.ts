/**
 * Config module - validation of generator settings
 */
export * from "./schema.js";
export * from "./settings.js";
export * from "./validate.js";
