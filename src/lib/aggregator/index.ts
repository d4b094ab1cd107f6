/**
 * Aggregator module - collects the distinct types seen per property
 */

import { ResultMapping, TypeLabel } from "../../types/data-model.js";
import { describeCause, InvalidInputError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { assertRecord, describeProperties } from "../enumerator/index.js";
import { defaultIntrospector } from "../enumerator/introspector.js";
import type { RecordIntrospector } from "../enumerator/types.js";
import { resolveObservation } from "../type-label/index.js";
import {
  AggregationMetadata,
  AggregationResult,
  AggregatorOptions,
  RecordSource,
} from "./types.js";

export * from "./types.js";

function isAsyncIterable(
  source: RecordSource,
): source is AsyncIterable<unknown> {
  return Symbol.asyncIterator in source;
}

/**
 * Accumulates, per property name, the insertion-ordered set of type labels
 * observed across a stream of records. One instance per aggregation session.
 */
export class TypeAggregator {
  private readonly options: AggregatorOptions;
  private readonly introspector: RecordIntrospector;
  private readonly allowList: ReadonlySet<string> | null;
  // Map and Set both iterate in insertion order
  private readonly observed = new Map<string, Set<TypeLabel>>();
  private recordsObserved = 0;
  private invalidRecords = 0;
  private resolutionFailures = 0;

  constructor(options: AggregatorOptions = {}) {
    this.options = options;
    this.introspector = options.introspector ?? defaultIntrospector;
    this.allowList =
      options.property && options.property.length > 0
        ? new Set(options.property)
        : null;
  }

  /**
   * Observe a single record
   */
  observe(record: unknown): void {
    const target = assertRecord(record);
    const names = describeProperties(target, {
      memberKinds: this.options.memberKinds,
      exclude: this.options.exclude,
      introspector: this.introspector,
    })
      .map((descriptor) => descriptor.name)
      .filter((name) => this.allowList === null || this.allowList.has(name));

    for (const name of names) {
      const resolution = resolveObservation(this.introspector, target, name);
      if (!resolution.ok) {
        this.resolutionFailures++;
        const { cause } = resolution.error;
        logger.debug("Type resolution failed, recording null label", () => ({
          property: name,
          reason: describeCause(cause),
        }));
      }

      let labels = this.observed.get(name);
      if (!labels) {
        labels = new Set<TypeLabel>();
        this.observed.set(name, labels);
      }
      labels.add(resolution.label);
    }

    this.recordsObserved++;
  }

  /**
   * Aggregate a stream of records, sync or async
   */
  async aggregateStream(records: RecordSource): Promise<AggregationResult> {
    logger.info("Starting type aggregation", {
      allowList: this.allowList ? Array.from(this.allowList) : "all",
      skipInvalid: this.options.skipInvalid ?? false,
    });

    if (isAsyncIterable(records)) {
      for await (const record of records) {
        this.consume(record);
      }
    } else {
      this.consumeAll(records);
    }

    const result = {
      mapping: this.finalize(),
      metadata: this.getMetadata(),
    };

    logger.info("Type aggregation complete", { ...result.metadata });
    return result;
  }

  /**
   * Observe every record of a synchronous collection
   */
  consumeAll(records: Iterable<unknown>): void {
    for (const record of records) {
      this.consume(record);
    }
  }

  /**
   * Observe one record of a stream, honoring skipInvalid
   */
  private consume(record: unknown): void {
    const index = this.recordsObserved + this.invalidRecords;
    try {
      this.observe(record);
    } catch (error) {
      if (!(this.options.skipInvalid && error instanceof InvalidInputError)) {
        throw error;
      }
      this.invalidRecords++;
      logger.warn("Skipping record that cannot be introspected", {
        index,
        reason: error.message,
      });
    }
  }

  /**
   * Snapshot of the accumulated mapping in first-observed property order.
   * Does not reset state; repeated calls return equal mappings.
   */
  finalize(): ResultMapping {
    return Array.from(this.observed, ([name, labels]) => ({
      name,
      types: Array.from(labels),
    }));
  }

  getMetadata(): AggregationMetadata {
    return {
      recordsObserved: this.recordsObserved,
      invalidRecords: this.invalidRecords,
      propertiesDiscovered: this.observed.size,
      resolutionFailures: this.resolutionFailures,
    };
  }
}

/**
 * Aggregate an in-memory collection of records with a fresh aggregator
 *
 * @example
 * aggregateTypes([{ a: "x" }, { a: 1, b: true }])
 * // Returns: [{ name: "a", types: ["String", "Integer"] }, { name: "b", types: ["Boolean"] }]
 */
export function aggregateTypes(
  records: Iterable<unknown>,
  options: AggregatorOptions = {},
): ResultMapping {
  const aggregator = new TypeAggregator(options);
  aggregator.consumeAll(records);
  return aggregator.finalize();
}
