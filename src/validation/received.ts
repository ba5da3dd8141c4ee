/**
 * Received values access
 *
 * Uniform lookup over the shapes a caller may hand in: plain objects,
 * Maps and association lists.
 *
 * @module validation/received
 */

import type { CheckSet, CheckSpec, FieldKey, LookupResult, ReceivedValues } from "./types.js";

const MISSING: LookupResult = { found: false };

function isAssociationList(value: readonly unknown[]): value is ReadonlyArray<readonly [FieldKey, unknown]> {
  return value.every(
    (entry) => Array.isArray(entry) && entry.length === 2 && typeof entry[0] === "string"
  );
}

function isReadonlyMap(value: unknown): value is ReadonlyMap<FieldKey, unknown> {
  return value instanceof Map;
}

function isTupleList<T>(value: unknown): value is ReadonlyArray<readonly [FieldKey, T]> {
  return Array.isArray(value);
}

function isPlainObject(value: unknown): value is Readonly<Record<FieldKey, unknown>> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Whether `value` can be addressed by field name.
 *
 * Class instances count as map-shaped so struct-like records validate
 * the same way as literals. An empty array is treated as an empty
 * association list.
 */
export function isMapShaped(value: unknown): value is ReceivedValues {
  if (isReadonlyMap(value)) return true;
  if (Array.isArray(value)) return isAssociationList(value);
  return typeof value === "object" && value !== null && !(value instanceof Date) && !(value instanceof RegExp);
}

/**
 * Look a key up without conflating "absent" and "present but undefined".
 */
export function lookupField(received: ReceivedValues, key: FieldKey): LookupResult {
  if (isReadonlyMap(received)) {
    return received.has(key) ? { found: true, value: received.get(key) } : MISSING;
  }

  if (isTupleList(received)) {
    const entry = received.find(([entryKey]) => entryKey === key);
    return entry ? { found: true, value: entry[1] } : MISSING;
  }

  if (Object.prototype.hasOwnProperty.call(received, key) || (!isPlainObject(received) && key in received)) {
    return { found: true, value: Reflect.get(received, key) };
  }
  return MISSING;
}

/**
 * Value for `key`, or undefined when absent.
 */
export function getField(received: ReceivedValues, key: FieldKey): unknown {
  const result = lookupField(received, key);
  return result.found ? result.value : undefined;
}

/**
 * Absent, null and undefined are all "empty".
 */
export function isEmptyValue(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Ordered (name, spec) pairs of a check set.
 */
export function checkEntries(checks: CheckSet): Array<readonly [string, CheckSpec]> {
  if (isTupleList<CheckSpec>(checks)) {
    return [...checks];
  }
  return Object.entries(checks);
}

/**
 * Spec of a named check within a set, if declared.
 */
export function findCheck(checks: CheckSet, name: string): CheckSpec | undefined {
  for (const [checkName, spec] of checkEntries(checks)) {
    if (checkName === name) return spec;
  }
  return undefined;
}
