/**
 * CLI configuration types
 */

import type { InputFormat, OutputFormat } from "../../types/config.js";
import type { MemberKind } from "../../types/data-model.js";
import type { LogLevel } from "../../utils/logger.js";

/**
 * `scan` section of a configuration file; every field is optional
 */
export interface ScanConfigSection {
  property?: string[];
  exclude?: string[];
  memberKinds?: MemberKind[];
  inputFormat?: InputFormat;
  output?: OutputFormat;
  skipInvalid?: boolean;
  logLevel?: LogLevel;
}

/**
 * Complete configuration file
 */
export interface TypeCensusConfig {
  scan?: ScanConfigSection;
}

/**
 * Raw options as parsed by commander for the scan command
 */
export interface ScanCommandOptions {
  property?: string; // Comma-separated
  exclude?: string; // Comma-separated
  memberKinds?: string; // Comma-separated
  inputFormat?: string;
  output?: string;
  skipInvalid?: boolean;
  config?: string;
  logLevel?: string;
}
