/**
 * Property enumerator types
 */

import type {
  InputRecord,
  MemberKind,
  PropertyDescriptor,
} from "../../types/data-model.js";

/**
 * Capability needed to inspect a record: list its named members and read a
 * member's current value. Swap in a custom implementation for records that
 * are not plain JavaScript objects (schema-backed rows, property bags).
 */
export interface RecordIntrospector {
  describe(record: InputRecord): PropertyDescriptor[];
  getValue(record: InputRecord, name: string): unknown;
}

export interface EnumerateOptions {
  memberKinds?: readonly MemberKind[];
  exclude?: readonly string[];
  introspector?: RecordIntrospector;
}
