// Single import point for the project's data types

export * from "./cdc.js";
export * from "./config.js";
