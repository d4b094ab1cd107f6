/**
 * Reporter module - renders a result mapping for humans or machines
 */

import type { OutputFormat } from "../../types/config.js";
import type { ResultMapping, TypeLabel } from "../../types/data-model.js";
import type { Renderer } from "./types.js";

export type { Renderer } from "./types.js";

const NAME_HEADER = "Name";
const VALUE_HEADER = "Value";

// Code points, not UTF-16 units, so astral characters count once
function displayLength(text: string): number {
  return Array.from(text).length;
}

function padCell(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - displayLength(text)));
}

/**
 * Render a label set as `{A, B}`
 */
export function formatTypeSet(types: readonly TypeLabel[]): string {
  return `{${types.join(", ")}}`;
}

/**
 * Two-column table with a dashed underline below each header
 *
 * @example
 * Name  Value
 * ----  -----
 * prop1 {String}
 * prop2 {Date, Integer}
 */
export function renderTable(mapping: ResultMapping): string {
  const width = mapping.reduce(
    (max, entry) => Math.max(max, displayLength(entry.name)),
    NAME_HEADER.length,
  );

  const lines = [
    `${padCell(NAME_HEADER, width)} ${VALUE_HEADER}`,
    `${padCell("-".repeat(NAME_HEADER.length), width)} ${"-".repeat(VALUE_HEADER.length)}`,
  ];
  for (const entry of mapping) {
    lines.push(`${padCell(entry.name, width)} ${formatTypeSet(entry.types)}`);
  }
  return lines.join("\n");
}

/**
 * Pretty-printed JSON array; an array keeps first-observed order even for
 * integer-like property names
 */
export function renderJson(mapping: ResultMapping): string {
  return JSON.stringify(mapping, null, 2);
}

const RENDERERS: Record<OutputFormat, Renderer> = {
  table: renderTable,
  json: renderJson,
};

export function render(mapping: ResultMapping, format: OutputFormat): string {
  return RENDERERS[format](mapping);
}
