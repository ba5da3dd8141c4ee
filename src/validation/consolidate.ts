/**
 * Error consolidation
 *
 * @module validation/consolidate
 */

import { isInvalid } from "./outcome.js";
import type { CheckOutcome, FieldKey, ValidationReport } from "./types.js";

/**
 * Group failing outcomes by field.
 *
 * Each message is prepended, so a field's list runs from the last
 * evaluated failure to the first. Callers rely on this order.
 */
export function consolidateErrors(outcomes: readonly CheckOutcome[]): ValidationReport {
  // Any string is a field name, "__proto__" included
  const byField = new Map<FieldKey, string[]>();

  for (const outcome of outcomes) {
    if (!isInvalid(outcome)) continue;
    byField.set(outcome.field, [outcome.message, ...(byField.get(outcome.field) ?? [])]);
  }

  return Object.fromEntries(byField);
}

/**
 * Render a report as text: one line per field, extra messages on
 * tab-indented continuation lines.
 *
 * @example
 * errorsMessage({ age: ["must be greater than 0", "has wrong type"] })
 * // "age: must be greater than 0\n\thas wrong type"
 */
export function errorsMessage(report: ValidationReport): string {
  return Object.entries(report)
    .map(([field, messages]) => `${field}: ${messages.join("\n\t")}`)
    .join("\n");
}
