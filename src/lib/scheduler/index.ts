export * from "./burst-scheduler.js";
