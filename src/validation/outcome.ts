/**
 * Check outcomes
 *
 * The single Valid | Invalid algebra every check result is reduced to.
 *
 * @module validation/outcome
 */

import type {
  CheckOutcome,
  CheckResult,
  DispatchResult,
  FieldKey,
  InvalidOutcome,
} from "./types.js";

export const VALID: CheckOutcome = Object.freeze({ valid: true });

export function invalid(field: FieldKey, message: string): InvalidOutcome {
  return { valid: false, field, message };
}

export function isInvalid(outcome: CheckOutcome): outcome is InvalidOutcome {
  return !outcome.valid;
}

/**
 * Reduce a primitive check's return value to outcomes.
 * Every entry of a failure record becomes one Invalid; `{}` is a pass.
 */
export function fromCheckResult(result: CheckResult): CheckOutcome[] {
  if (result === true) return [VALID];

  const entries = Object.entries(result);
  if (entries.length === 0) return [VALID];

  return entries.map(([field, message]) => invalid(field, String(message)));
}

function isOutcomeList(result: DispatchResult): result is readonly DispatchResult[] {
  return Array.isArray(result);
}

/**
 * Expand nested dispatch results into a flat, order-preserving list.
 */
export function flattenOutcomes(result: DispatchResult, into: CheckOutcome[] = []): CheckOutcome[] {
  if (!isOutcomeList(result)) {
    into.push(result);
    return into;
  }

  for (const item of result) {
    flattenOutcomes(item, into);
  }
  return into;
}

export function allValid(outcomes: readonly CheckOutcome[]): boolean {
  return outcomes.every((outcome) => outcome.valid);
}
