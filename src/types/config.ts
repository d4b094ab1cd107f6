/**
 * Configuration types for typecensus
 */

import type { MemberKind } from "./data-model.js";
import type { LogLevel } from "../utils/logger.js";

/**
 * How records are laid out in an input file
 */
export type InputFormat = "ndjson" | "json" | "auto";

/**
 * How a result mapping is rendered
 */
export type OutputFormat = "table" | "json";

export const INPUT_FORMATS: readonly InputFormat[] = ["ndjson", "json", "auto"];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json"];

/**
 * ScanConfig - fully resolved settings for one scan run
 */
export interface ScanConfig {
  property: string[]; // Allow-list; empty means every property
  exclude: string[];
  memberKinds: MemberKind[];
  inputFormat: InputFormat;
  output: OutputFormat;
  skipInvalid: boolean;
  logLevel?: LogLevel;
}
