/**
 * Core type exports
 */

export * from "./data-model.js";
export * from "./config.js";
