/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { Ajv, type ErrorObject } from "ajv";
import { parse as parseYaml } from "yaml";
import {
  INPUT_FORMATS,
  InputFormat,
  OUTPUT_FORMATS,
  OutputFormat,
  ScanConfig,
} from "../../types/config.js";
import {
  DEFAULT_MEMBER_KINDS,
  isMemberKind,
  MemberKind,
} from "../../types/data-model.js";
import { ConfigError } from "../../utils/errors.js";
import { isLogLevel, logger, LogLevel } from "../../utils/logger.js";
import { CONFIG_SCHEMA } from "./schema.js";
import type {
  ScanCommandOptions,
  ScanConfigSection,
  TypeCensusConfig,
} from "./types.js";

const ajv = new Ajv({
  allErrors: true, // Collect all validation errors
});
const validateSchema = ajv.compile<TypeCensusConfig>(CONFIG_SCHEMA);

function formatSchemaErrors(
  errors: ErrorObject[] | null | undefined,
): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || "/"}: ${error.message ?? error.keyword}`,
  );
}

/**
 * Check a parsed document against the configuration schema
 */
export function validateConfig(
  raw: unknown,
  source = "config",
): TypeCensusConfig {
  // An empty YAML document parses to null
  const candidate = raw ?? {};
  if (!validateSchema(candidate)) {
    throw new ConfigError(
      `Invalid configuration in ${source}`,
      formatSchemaErrors(validateSchema.errors),
    );
  }
  return candidate;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): TypeCensusConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = validateConfig(parsed, filePath);
  logger.info("Configuration file parsed successfully", {
    hasScanConfig: config.scan !== undefined,
  });
  return config;
}

/**
 * Split a comma-separated CLI value, dropping blanks
 */
export function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function pickOption<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  flag: string,
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid value for ${flag}: ${value}. Expected one of: ${allowed.join(", ")}`,
    );
  }
  return match;
}

function parseMemberKinds(value: string | undefined): MemberKind[] | undefined {
  const names = splitList(value);
  if (names === undefined) {
    return undefined;
  }
  return names.map((name) => {
    if (!isMemberKind(name)) {
      throw new ConfigError(`Invalid member kind for --member-kinds: ${name}`);
    }
    return name;
  });
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isLogLevel(value)) {
    throw new ConfigError(`Invalid value for --log-level: ${value}`);
  }
  return value;
}

/**
 * Merge CLI options with the config file section.
 * Precedence: CLI > config file > defaults.
 */
export function mergeScanConfig(
  options: ScanCommandOptions,
  section: ScanConfigSection = {},
): ScanConfig {
  const inputFormat: InputFormat =
    pickOption(options.inputFormat, INPUT_FORMATS, "--input-format") ??
    section.inputFormat ??
    "auto";
  const output: OutputFormat =
    pickOption(options.output, OUTPUT_FORMATS, "--output") ??
    section.output ??
    "table";

  return {
    property: splitList(options.property) ?? section.property ?? [],
    exclude: splitList(options.exclude) ?? section.exclude ?? [],
    memberKinds: parseMemberKinds(options.memberKinds) ??
      section.memberKinds ?? [...DEFAULT_MEMBER_KINDS],
    inputFormat,
    output,
    skipInvalid: options.skipInvalid ?? section.skipInvalid ?? false,
    logLevel: parseLogLevel(options.logLevel) ?? section.logLevel,
  };
}
