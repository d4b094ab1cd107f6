/**
 * Enumerator module - lists the named properties of a single record
 */

import {
  DEFAULT_MEMBER_KINDS,
  InputRecord,
  PropertyDescriptor,
} from "../../types/data-model.js";
import { InvalidInputError } from "../../utils/errors.js";
import { defaultIntrospector } from "./introspector.js";
import type { EnumerateOptions } from "./types.js";

export * from "./types.js";
export * from "./introspector.js";

/**
 * Narrow an arbitrary input to a record, rejecting values that have no
 * named properties to inspect
 */
export function assertRecord(value: unknown): InputRecord {
  if (value === null || value === undefined) {
    throw new InvalidInputError("No record supplied");
  }
  if (typeof value !== "object") {
    throw new InvalidInputError(
      `Expected a record but received a ${typeof value}`,
      { receivedType: typeof value },
    );
  }
  let isArray: boolean;
  try {
    isArray = Array.isArray(value);
  } catch (error) {
    // Revoked proxies throw on any inspection
    throw new InvalidInputError("Record cannot be introspected", undefined, {
      cause: error,
    });
  }
  if (isArray) {
    throw new InvalidInputError("Expected a record but received an array", {
      receivedType: "array",
    });
  }
  return value;
}

/**
 * Describe the qualifying members of a record, in native declaration order
 */
export function describeProperties(
  record: unknown,
  options: EnumerateOptions = {},
): PropertyDescriptor[] {
  const target = assertRecord(record);
  const introspector = options.introspector ?? defaultIntrospector;
  const kinds = new Set(options.memberKinds ?? DEFAULT_MEMBER_KINDS);
  const excluded = new Set(options.exclude ?? []);

  let descriptors: PropertyDescriptor[];
  try {
    descriptors = introspector.describe(target);
  } catch (error) {
    throw new InvalidInputError("Record cannot be introspected", undefined, {
      cause: error,
    });
  }

  return descriptors.filter(
    (descriptor) =>
      kinds.has(descriptor.kind) && !excluded.has(descriptor.name),
  );
}

/**
 * List the names of the qualifying members of a record
 *
 * @example
 * enumerateProperties({ a: 1, run() {} })
 * // Returns: ["a"]
 */
export function enumerateProperties(
  record: unknown,
  options: EnumerateOptions = {},
): string[] {
  return describeProperties(record, options).map((d) => d.name);
}
