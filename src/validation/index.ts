/**
 * Validation module
 *
 * Contract walker, check dispatch and error consolidation.
 */

export {
  ContractValidator,
  validate,
  valid,
  assertValid,
  INVALID_CONFIGURATION_MESSAGE,
  MISSING_INNER_KEY_MESSAGE,
} from "./contract-validator.js";

export { consolidateErrors, errorsMessage } from "./consolidate.js";

export {
  createCheckRegistry,
  resolveCheck,
  INNER_CHECK,
  STRUCTURAL_CHECKS,
  type PrimitiveChecks,
} from "./registry.js";

export { VALID, invalid, isInvalid, allValid, flattenOutcomes, fromCheckResult } from "./outcome.js";

export { lookupField, getField, isMapShaped, isEmptyValue, checkEntries, findCheck } from "./received.js";

export {
  parseContract,
  safeParseContract,
  zodToContractIssues,
  ContractSchema,
  FieldSpecSchema,
  CheckSetSchema,
  type ContractParseResult,
} from "./contract-schema.js";

export {
  ContractValidationError,
  ContractDefinitionError,
  ContractDepthExceededError,
  MalformedNestedLookupError,
  type ContractDefinitionIssue,
} from "./errors.js";

export type {
  FieldKey,
  CheckName,
  CheckSpec,
  CheckSet,
  FieldSpec,
  Contract,
  InnerListSpec,
  ReceivedValues,
  LookupResult,
  CheckOutcome,
  InvalidOutcome,
  DispatchResult,
  CheckResult,
  CheckFn,
  CheckImpl,
  CheckRegistry,
  StructuralCheckKind,
  ValidationReport,
  ValidationResult,
  MissingInnerKeyPolicy,
  ContractValidatorOptions,
} from "./types.js";
