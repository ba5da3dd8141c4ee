/**
 * Error types raised by the contract validation engine.
 *
 * A failed contract is normally returned as data from `valid()`;
 * these are for the throwing entry point and for fatal conditions
 * that are not validation failures at all.
 */

import type { FieldKey, ValidationReport } from "./types.js";

/**
 * Contract validation failure, thrown by `assertValid()`.
 */
export class ContractValidationError extends Error {
  readonly name = "ContractValidationError";

  constructor(
    public readonly errors: ValidationReport,
    message = "Contract validation failed"
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ContractValidationError);
    }
  }
}

/**
 * An `inner` map declares a key that the received map does not contain,
 * under the "throw" missing-key policy.
 */
export class MalformedNestedLookupError extends Error {
  readonly name = "MalformedNestedLookupError";

  constructor(
    public readonly parentField: FieldKey,
    public readonly innerKey: FieldKey
  ) {
    super(`Inner key "${innerKey}" of "${parentField}" is missing from the received value`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MalformedNestedLookupError);
    }
  }
}

/**
 * Structural checks nested deeper than the configured limit.
 */
export class ContractDepthExceededError extends Error {
  readonly name = "ContractDepthExceededError";

  constructor(
    public readonly field: FieldKey,
    public readonly maxDepth: number
  ) {
    super(`Nested contract depth exceeded ${maxDepth} at "${field}"`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ContractDepthExceededError);
    }
  }
}

export interface ContractDefinitionIssue {
  code: string;
  path: string;
  message: string;
}

/**
 * Contract data did not have the shape of a contract.
 */
export class ContractDefinitionError extends Error {
  readonly name = "ContractDefinitionError";

  constructor(public readonly issues: ContractDefinitionIssue[]) {
    super(`Invalid contract definition (${issues.length} issue${issues.length === 1 ? "" : "s"})`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ContractDefinitionError);
    }
  }
}
