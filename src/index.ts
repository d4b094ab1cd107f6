/**
 * typecensus: per-property runtime type discovery for semi-structured records
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/enumerator/index.js";
export * from "./lib/type-label/index.js";
export * from "./lib/aggregator/index.js";
export * from "./lib/reader/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
