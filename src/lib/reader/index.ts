/**
 * Reader module - streams records from NDJSON or JSON array files
 *
 * Values are parsed as relaxed Extended JSON, so `{"$date": ...}`,
 * `{"$oid": ...}` and the other EJSON wrappers arrive as typed values.
 */

import { createReadStream } from "fs";
import { access, readFile } from "fs/promises";
import * as readline from "readline";
import type { Readable } from "stream";
import { BSON } from "mongodb";
import type { InputFormat } from "../../types/config.js";
import { FileIOError, InputReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ReaderOptions } from "./types.js";

export * from "./types.js";

export function isStdin(inputPath: string): boolean {
  return inputPath === "-" || inputPath === "stdin";
}

/**
 * Pick a concrete format; "auto" means JSON for .json files, NDJSON otherwise
 */
export function resolveInputFormat(
  inputPath: string,
  format: InputFormat = "auto",
): Exclude<InputFormat, "auto"> {
  if (format !== "auto") {
    return format;
  }
  return !isStdin(inputPath) && inputPath.toLowerCase().endsWith(".json")
    ? "json"
    : "ndjson";
}

/**
 * Parse one NDJSON line
 */
export function parseRecordLine(line: string, lineNumber: number): unknown {
  try {
    const record: unknown = BSON.EJSON.parse(line, { relaxed: true });
    return record;
  } catch (err) {
    throw new InputReadError(
      `Failed to parse NDJSON line ${lineNumber}: ${line.substring(0, 100)}`,
      { lineNumber },
      { cause: err },
    );
  }
}

/**
 * Yield one record per non-blank line of a stream
 */
export async function* readNdjsonRecords(
  input: Readable,
): AsyncGenerator<unknown> {
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity, // Handle all line endings
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const trimmed = line.trim();
    if (trimmed === "") continue;

    yield parseRecordLine(trimmed, lineNumber);
  }
}

/**
 * Parse a JSON array document into its records
 */
export function parseJsonArray(content: string, source: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = BSON.EJSON.parse(content, { relaxed: true });
  } catch (err) {
    throw new InputReadError(`Failed to parse JSON input: ${source}`, undefined, {
      cause: err,
    });
  }

  if (!Array.isArray(parsed)) {
    throw new InputReadError(
      `Expected a JSON array of records in ${source}`,
      { receivedType: parsed === null ? "null" : typeof parsed },
    );
  }
  return parsed;
}

async function ensureReadable(inputPath: string): Promise<void> {
  try {
    await access(inputPath);
  } catch (err) {
    throw new FileIOError(`Input file not found at: ${inputPath}`, undefined, {
      cause: err,
    });
  }
}

async function readWholeInput(
  inputPath: string,
  stdin: Readable,
): Promise<string> {
  if (!isStdin(inputPath)) {
    try {
      return await readFile(inputPath, "utf8");
    } catch (err) {
      throw new FileIOError(`Failed to read input from ${inputPath}`, undefined, {
        cause: err,
      });
    }
  }

  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Stream records from a file path, or from stdin for "-" / "stdin"
 */
export async function* readRecords(
  inputPath: string,
  options: ReaderOptions = {},
): AsyncGenerator<unknown> {
  const format = resolveInputFormat(inputPath, options.format);
  const stdin = options.stdin ?? process.stdin;

  logger.info("Reading records", { input: inputPath, format });

  if (!isStdin(inputPath)) {
    await ensureReadable(inputPath);
  }

  if (format === "json") {
    const content = await readWholeInput(inputPath, stdin);
    yield* parseJsonArray(content, inputPath);
    return;
  }

  const input = isStdin(inputPath)
    ? stdin
    : createReadStream(inputPath, { encoding: "utf8" });
  yield* readNdjsonRecords(input);
}
