/**
 * Scan command - report the distinct types seen per property of a record stream
 */

import { Command } from "commander";
import type { Readable } from "stream";
import { TypeAggregator } from "../../lib/aggregator/index.js";
import type { AggregationResult } from "../../lib/aggregator/types.js";
import { readRecords } from "../../lib/reader/index.js";
import { render } from "../../lib/reporter/index.js";
import type { ScanConfig } from "../../types/config.js";
import { ErrorCode, toTypeCensusError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { mergeScanConfig, parseConfigFile } from "../config/parser.js";
import type { ScanCommandOptions } from "../config/types.js";

export interface ScanOutcome {
  config: ScanConfig;
  result: AggregationResult;
  output: string;
}

export interface ScanIO {
  stdin?: Readable;
}

/**
 * Resolve configuration, aggregate the input and render the mapping
 */
export async function runScan(
  input: string,
  options: ScanCommandOptions,
  io: ScanIO = {},
): Promise<ScanOutcome> {
  const fileConfig = options.config ? parseConfigFile(options.config) : undefined;
  const config = mergeScanConfig(options, fileConfig?.scan);

  if (config.logLevel) {
    logger.setLevel(config.logLevel);
  }
  logger.debug("Resolved scan configuration", { input, ...config });

  const aggregator = new TypeAggregator({
    property: config.property,
    exclude: config.exclude,
    memberKinds: config.memberKinds,
    skipInvalid: config.skipInvalid,
  });
  const result = await aggregator.aggregateStream(
    readRecords(input, { format: config.inputFormat, stdin: io.stdin }),
  );

  return {
    config,
    result,
    output: render(result.mapping, config.output),
  };
}

/**
 * Fold the program-level `--log-level` into the command's own options
 */
export function resolveScanOptions(
  options: ScanCommandOptions,
  command: Command,
): ScanCommandOptions {
  const globalLevel: unknown = command.optsWithGlobals().logLevel;
  return typeof globalLevel === "string"
    ? { ...options, logLevel: globalLevel }
    : options;
}

/**
 * Execute scan command
 */
async function executeScan(
  input: string,
  options: ScanCommandOptions,
  command: Command,
): Promise<void> {
  try {
    const { output } = await runScan(input, resolveScanOptions(options, command));
    process.stdout.write(`${output}\n`);
  } catch (error) {
    const censusError = toTypeCensusError(error);
    console.error(JSON.stringify(censusError.toResponse("scan"), null, 2));

    // Configuration problems exit with 2, everything else with 1
    process.exit(censusError.code === ErrorCode.CONFIG_ERROR ? 2 : 1);
  }
}

/**
 * Create scan command
 */
export function createScanCommand(): Command {
  const command = new Command("scan");

  command
    .description(
      "Read records and list, per property, the distinct value types observed",
    )
    .argument("<input>", 'NDJSON or JSON array file (or "-" for stdin)')
    .option(
      "--property <names>",
      "Only aggregate these properties (comma-separated, exact match)",
    )
    .option("--exclude <names>", "Ignore these properties (comma-separated)")
    .option(
      "--member-kinds <kinds>",
      "Member kinds to include: data, computed, method, writeOnly (default: data,computed)",
    )
    .option("--input-format <format>", "Input format: ndjson, json, auto")
    .option("--output <format>", "Output format: table, json")
    .option(
      "--skip-invalid",
      "Skip records that are not objects instead of failing",
    )
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(executeScan);

  return command;
}
