/**
 * Reflection over plain objects, class instances and Maps
 */

import type {
  InputRecord,
  MemberKind,
  PropertyDescriptor as RecordPropertyDescriptor,
} from "../../types/data-model.js";
import type { RecordIntrospector } from "./types.js";

/**
 * Classify a JavaScript property descriptor
 */
export function classifyDescriptor(descriptor: PropertyDescriptor): MemberKind {
  if ("value" in descriptor) {
    return typeof descriptor.value === "function" ? "method" : "data";
  }
  return descriptor.get ? "computed" : "writeOnly";
}

function describeMap(
  record: Map<unknown, unknown>,
): RecordPropertyDescriptor[] {
  const descriptors: RecordPropertyDescriptor[] = [];
  for (const [key, value] of record) {
    if (typeof key !== "string") continue;
    descriptors.push({
      name: key,
      kind: typeof value === "function" ? "method" : "data",
    });
  }
  return descriptors;
}

/**
 * Own enumerable keys first, then members inherited through the prototype
 * chain (nearest first). Object.prototype and constructors are not members.
 */
function describeObject(record: InputRecord): RecordPropertyDescriptor[] {
  const descriptors: RecordPropertyDescriptor[] = [];
  const seen = new Set<string>(Object.getOwnPropertyNames(record));

  for (const name of Object.keys(record)) {
    const descriptor = Object.getOwnPropertyDescriptor(record, name);
    if (descriptor) {
      descriptors.push({ name, kind: classifyDescriptor(descriptor) });
    }
  }

  let proto: unknown = Object.getPrototypeOf(record);
  while (proto !== null && proto !== Object.prototype && typeof proto === "object") {
    for (const name of Object.getOwnPropertyNames(proto)) {
      if (name === "constructor" || seen.has(name)) continue;
      seen.add(name);

      const descriptor = Object.getOwnPropertyDescriptor(proto, name);
      if (descriptor) {
        descriptors.push({ name, kind: classifyDescriptor(descriptor) });
      }
    }
    proto = Object.getPrototypeOf(proto);
  }

  return descriptors;
}

export const defaultIntrospector: RecordIntrospector = {
  describe(record) {
    return record instanceof Map ? describeMap(record) : describeObject(record);
  },

  getValue(record, name) {
    if (record instanceof Map) {
      return record.get(name);
    }
    return Reflect.get(record, name);
  },
};
