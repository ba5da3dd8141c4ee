/**
 * Primitive Checks
 *
 * Default check library. Every check reads its field from the received
 * values and returns `true` or `{ [field]: message }`. Apart from
 * `required`, checks pass when the value is absent, null or undefined.
 *
 * Checks never throw on bad input: a spec they cannot interpret is
 * reported against the field.
 *
 * @module checks/primitive-checks
 */

import { isDeepStrictEqual } from "node:util";
import { getField, isEmptyValue } from "../validation/received.js";
import type { CheckFn, CheckResult, FieldKey } from "../validation/types.js";

export const INVALID_SPEC_MESSAGE = "has invalid check configuration";

export type TypeName =
  | "boolean"
  | "integer"
  | "float"
  | "number"
  | "string"
  | "list"
  | "map"
  | "function";

export type FuncCheckSpec = (value: unknown, fieldName: FieldKey) => boolean | string;

// =============================================================================
// Helpers
// =============================================================================

function fail(fieldName: FieldKey, message: string): CheckResult {
  return { [fieldName]: message };
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && !Number.isNaN(value);
}

function isMapLike(value: unknown): boolean {
  if (value instanceof Map) return true;
  return isRecord(value) && !(value instanceof Date) && !(value instanceof RegExp);
}

function inspectValue(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

const TYPE_PREDICATES: Record<TypeName, (value: unknown) => boolean> = {
  boolean: (value) => typeof value === "boolean",
  integer: (value) => Number.isInteger(value),
  // No runtime distinction between floats and integers
  float: (value) => isNumber(value),
  number: (value) => isNumber(value),
  string: (value) => typeof value === "string",
  list: (value) => Array.isArray(value),
  map: isMapLike,
  function: (value) => typeof value === "function",
};

function isTypeName(value: unknown): value is TypeName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(TYPE_PREDICATES, value);
}

function isFuncCheckSpec(value: unknown): value is FuncCheckSpec {
  return typeof value === "function";
}

function measure(value: unknown): number | undefined {
  if (typeof value === "string" || Array.isArray(value)) return value.length;
  if (value instanceof Map) return value.size;
  if (isMapLike(value) && isRecord(value)) return Object.keys(value).length;
  return undefined;
}

// =============================================================================
// Checks
// =============================================================================

/**
 * `required: true`: the field is present and not null/undefined.
 */
export const checkRequired: CheckFn = (received, fieldName, spec) => {
  if (!spec) return true;
  return isEmptyValue(getField(received, fieldName)) ? fail(fieldName, "is required") : true;
};

/**
 * `type: "integer"` etc.
 */
export const checkType: CheckFn = (received, fieldName, spec) => {
  if (!isTypeName(spec)) return fail(fieldName, INVALID_SPEC_MESSAGE);

  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;

  return TYPE_PREDICATES[spec](value) ? true : fail(fieldName, "has wrong type");
};

const NUMERIC_RULES: ReadonlyArray<{
  key: string;
  label: string;
  test: (value: number, bound: number) => boolean;
}> = [
  { key: "equal_to", label: "equal to", test: (v, b) => v === b },
  { key: "greater_than", label: "greater than", test: (v, b) => v > b },
  { key: "greater_than_or_equal_to", label: "greater than or equal to", test: (v, b) => v >= b },
  { key: "less_than", label: "less than", test: (v, b) => v < b },
  { key: "less_than_or_equal_to", label: "less than or equal to", test: (v, b) => v <= b },
];

/**
 * `numericality: { greater_than: 0, less_than_or_equal_to: 10 }`
 * Reports the first violated bound.
 */
export const checkNumericality: CheckFn = (received, fieldName, spec) => {
  if (!isRecord(spec)) return fail(fieldName, INVALID_SPEC_MESSAGE);

  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;
  if (!isNumber(value)) return fail(fieldName, "must be a number");

  for (const rule of NUMERIC_RULES) {
    if (!(rule.key in spec)) continue;
    const bound = spec[rule.key];
    if (!isNumber(bound)) return fail(fieldName, INVALID_SPEC_MESSAGE);
    if (!rule.test(value, bound)) {
      return fail(fieldName, `must be ${rule.label} ${bound}`);
    }
  }
  return true;
};

/**
 * `equals: <value>`, compared deeply.
 */
export const checkEquals: CheckFn = (received, fieldName, spec) => {
  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;
  return isDeepStrictEqual(value, spec) ? true : fail(fieldName, `must be equal to ${inspectValue(spec)}`);
};

/**
 * `in: [a, b, c]`
 */
export const checkIn: CheckFn = (received, fieldName, spec) => {
  if (!Array.isArray(spec)) return fail(fieldName, INVALID_SPEC_MESSAGE);

  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;

  return spec.some((allowed: unknown) => isDeepStrictEqual(value, allowed))
    ? true
    : fail(fieldName, `must be one of ${inspectValue(spec)}`);
};

/**
 * `not_in: [a, b, c]`
 */
export const checkNotIn: CheckFn = (received, fieldName, spec) => {
  if (!Array.isArray(spec)) return fail(fieldName, INVALID_SPEC_MESSAGE);

  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;

  return spec.some((excluded: unknown) => isDeepStrictEqual(value, excluded))
    ? fail(fieldName, `must not be included in ${inspectValue(spec)}`)
    : true;
};

/**
 * `format: /^\d+$/` or a pattern string. Non-strings fail.
 */
export const checkFormat: CheckFn = (received, fieldName, spec) => {
  let pattern: RegExp;
  if (spec instanceof RegExp) {
    pattern = spec;
  } else if (typeof spec === "string") {
    try {
      pattern = new RegExp(spec);
    } catch {
      return fail(fieldName, INVALID_SPEC_MESSAGE);
    }
  } else {
    return fail(fieldName, INVALID_SPEC_MESSAGE);
  }

  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;

  // search() ignores lastIndex, so global patterns behave
  return typeof value === "string" && value.search(pattern) !== -1
    ? true
    : fail(fieldName, "has invalid format");
};

/**
 * `length: { min, max, is, in: [min, max] }` over strings, lists and maps.
 * Reports the first violated rule.
 */
export const checkLength: CheckFn = (received, fieldName, spec) => {
  if (!isRecord(spec)) return fail(fieldName, INVALID_SPEC_MESSAGE);

  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;

  const length = measure(value);
  if (length === undefined) return fail(fieldName, "length check is not applicable");

  for (const [rule, bound] of Object.entries(spec)) {
    switch (rule) {
      case "min":
        if (!isNumber(bound)) return fail(fieldName, INVALID_SPEC_MESSAGE);
        if (length < bound) return fail(fieldName, `length must be greater than or equal to ${bound}`);
        break;
      case "max":
        if (!isNumber(bound)) return fail(fieldName, INVALID_SPEC_MESSAGE);
        if (length > bound) return fail(fieldName, `length must be less than or equal to ${bound}`);
        break;
      case "is":
        if (!isNumber(bound)) return fail(fieldName, INVALID_SPEC_MESSAGE);
        if (length !== bound) return fail(fieldName, `length must be equal to ${bound}`);
        break;
      case "in": {
        if (!Array.isArray(bound) || bound.length !== 2 || !bound.every(isNumber)) {
          return fail(fieldName, INVALID_SPEC_MESSAGE);
        }
        const [lower, upper] = bound;
        if (length < lower || length > upper) {
          return fail(fieldName, `length must be in range ${lower}-${upper}`);
        }
        break;
      }
      default:
        break;
    }
  }
  return true;
};

/**
 * `func: (value, fieldName) => boolean | string`
 * A returned string is the failure message.
 */
export const checkFunc: CheckFn = (received, fieldName, spec) => {
  if (!isFuncCheckSpec(spec)) return fail(fieldName, INVALID_SPEC_MESSAGE);

  const value = getField(received, fieldName);
  if (isEmptyValue(value)) return true;

  const result = spec(value, fieldName);
  if (result === true) return true;
  return fail(fieldName, typeof result === "string" ? result : "isn't valid");
};
