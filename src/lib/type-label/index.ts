/**
 * Runtime type labels for observed property values
 */

import { InputRecord, NULL_TYPE_LABEL, TypeLabel } from "../../types/data-model.js";
import { TypeResolutionError } from "../../utils/errors.js";
import type { RecordIntrospector } from "../enumerator/types.js";

export type TypeResolution =
  | { ok: true; label: TypeLabel }
  | { ok: false; label: TypeLabel; error: TypeResolutionError };

// Older bson releases spell ObjectId with a capital D
const BSON_LABEL_ALIASES: Record<string, TypeLabel> = {
  ObjectID: "ObjectId",
};

/**
 * BSON wrapper classes carry their type name in `_bsontype`
 */
function bsonTypeOf(value: object): TypeLabel | undefined {
  const tag: unknown = Reflect.get(value, "_bsontype");
  if (typeof tag !== "string" || tag === "") {
    return undefined;
  }
  return BSON_LABEL_ALIASES[tag] ?? tag;
}

function objectLabel(value: object): TypeLabel {
  if (value instanceof Date) return "Date";
  if (Array.isArray(value)) return "Array";

  // Plain data may carry a `_bsontype` key of its own; only class
  // instances are BSON wrappers
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) {
    return "Object";
  }

  const bsonType = bsonTypeOf(value);
  if (bsonType) return bsonType;

  const ctor: unknown =
    typeof proto === "object" ? Reflect.get(proto, "constructor") : undefined;
  if (typeof ctor === "function" && ctor.name) {
    return ctor.name;
  }

  // "[object Tag]" -> "Tag"
  return Object.prototype.toString.call(value).slice(8, -1);
}

/**
 * Label a value by its exact runtime type. Throws when the value cannot be
 * inspected (revoked proxies, hostile getters); use resolveTypeLabel to get
 * the sentinel instead.
 */
export function labelOf(value: unknown): TypeLabel {
  if (value === null || value === undefined) {
    return NULL_TYPE_LABEL;
  }

  switch (typeof value) {
    case "string":
      return "String";
    case "boolean":
      return "Boolean";
    case "bigint":
      return "BigInt";
    case "symbol":
      return "Symbol";
    case "function":
      return "Function";
    case "number":
      return Number.isInteger(value) ? "Integer" : "Double";
    case "object":
      return objectLabel(value);
    default:
      return NULL_TYPE_LABEL;
  }
}

function failure(
  message: string,
  details: Record<string, unknown>,
  cause: unknown,
): TypeResolution {
  return {
    ok: false,
    label: NULL_TYPE_LABEL,
    error: new TypeResolutionError(message, details, { cause }),
  };
}

/**
 * Resolve the label of a value, mapping any failure to the null sentinel
 */
export function resolveTypeLabel(value: unknown): TypeResolution {
  try {
    return { ok: true, label: labelOf(value) };
  } catch (error) {
    return failure("Failed to determine value type", {}, error);
  }
}

/**
 * Read one property from a record and resolve the label of its value
 */
export function resolveObservation(
  introspector: RecordIntrospector,
  record: InputRecord,
  name: string,
): TypeResolution {
  let value: unknown;
  try {
    value = introspector.getValue(record, name);
  } catch (error) {
    return failure(`Failed to read property "${name}"`, { property: name }, error);
  }

  const resolution = resolveTypeLabel(value);
  if (resolution.ok) {
    return resolution;
  }
  return failure(
    `Failed to determine type of property "${name}"`,
    { property: name },
    resolution.error.cause,
  );
}
