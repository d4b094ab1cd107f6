/**
 * Core data model for type aggregation
 */

/**
 * Classification of a named member on a record.
 *
 * - `data`: a stored, non-function value
 * - `computed`: an accessor with a getter
 * - `method`: a function-valued member
 * - `writeOnly`: an accessor with only a setter
 */
export type MemberKind = "data" | "computed" | "method" | "writeOnly";

export const MEMBER_KINDS: readonly MemberKind[] = [
  "data",
  "computed",
  "method",
  "writeOnly",
];

/**
 * Members that expose a gettable value
 */
export const DEFAULT_MEMBER_KINDS: readonly MemberKind[] = ["data", "computed"];

export function isMemberKind(value: unknown): value is MemberKind {
  return typeof value === "string" && MEMBER_KINDS.some((k) => k === value);
}

/**
 * A single structured input value with zero or more named properties
 */
export type InputRecord = object;

export interface PropertyDescriptor {
  name: string;
  kind: MemberKind;
}

/**
 * Opaque identifier of a value's runtime type, compared only for equality
 */
export type TypeLabel = string;

/**
 * Label used when a value is absent or its type cannot be determined
 */
export const NULL_TYPE_LABEL: TypeLabel = "Null";

/**
 * Distinct type labels seen for one property, in first-seen order
 */
export interface PropertyTypes {
  name: string;
  types: TypeLabel[];
}

/**
 * Final output: one entry per distinct property, in first-observed order
 */
export type ResultMapping = PropertyTypes[];
