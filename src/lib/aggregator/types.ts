/**
 * Type aggregator types
 */

import type { ResultMapping } from "../../types/data-model.js";
import type { EnumerateOptions } from "../enumerator/types.js";

/**
 * Options for the aggregator
 */
export interface AggregatorOptions extends EnumerateOptions {
  /** Allow-list of property names, matched exactly. Empty means all. */
  property?: readonly string[];
  /** Skip records that cannot be introspected instead of failing the stream */
  skipInvalid?: boolean;
}

export interface AggregationMetadata {
  recordsObserved: number;
  invalidRecords: number;
  propertiesDiscovered: number;
  resolutionFailures: number;
}

export interface AggregationResult {
  mapping: ResultMapping;
  metadata: AggregationMetadata;
}

export type RecordSource = Iterable<unknown> | AsyncIterable<unknown>;
