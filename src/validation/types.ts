/**
 * Contract Validation Types
 *
 * Type definitions for the contract walker, check dispatcher and
 * error consolidator.
 *
 * @module validation/types
 */

// =============================================================================
// Contract
// =============================================================================

/** Names a field in a contract and in a received value set. */
export type FieldKey = string;

export type CheckName = string;

/** Check configuration. Its shape is owned by the check that reads it. */
export type CheckSpec = unknown;

/**
 * Ordered (checkName, checkSpec) pairs. Either a plain object, read in
 * insertion order, or an explicit list of tuples.
 */
export type CheckSet =
  | Readonly<Record<CheckName, CheckSpec>>
  | ReadonlyArray<readonly [CheckName, CheckSpec]>;

export interface FieldSpec {
  name: FieldKey;
  checks: CheckSet;
}

export type Contract = readonly FieldSpec[];

/**
 * Element description for a list-shaped `inner` check.
 * The name is informational: elements are keyed `<field>_<index>`.
 */
export interface InnerListSpec {
  name?: FieldKey;
  checks: CheckSet;
}

// =============================================================================
// Received values
// =============================================================================

/**
 * Values supplied for one validation pass: a plain object, a Map,
 * or an association list (first matching key wins).
 */
export type ReceivedValues =
  | Readonly<Record<FieldKey, unknown>>
  | ReadonlyMap<FieldKey, unknown>
  | ReadonlyArray<readonly [FieldKey, unknown]>;

export type LookupResult =
  | { found: true; value: unknown }
  | { found: false };

// =============================================================================
// Outcomes
// =============================================================================

export type CheckOutcome =
  | { valid: true }
  | { valid: false; field: FieldKey; message: string };

export type InvalidOutcome = Extract<CheckOutcome, { valid: false }>;

/**
 * What a structural check produces before flattening.
 * Never returned from a public entry point.
 */
export type DispatchResult = CheckOutcome | readonly DispatchResult[];

/**
 * What a primitive check returns: `true` on success, otherwise a
 * `{ [field]: message }` record (normally a single key).
 */
export type CheckResult = true | Readonly<Record<FieldKey, string>>;

export type CheckFn = (
  received: ReceivedValues,
  fieldName: FieldKey,
  checkSpec: CheckSpec
) => CheckResult;

// =============================================================================
// Registry
// =============================================================================

export type StructuralCheckKind = "inner";

export type CheckImpl =
  | { kind: "primitive"; fn: CheckFn }
  | { kind: "structural"; structure: StructuralCheckKind };

export type CheckRegistry = ReadonlyMap<CheckName, CheckImpl>;

// =============================================================================
// Results
// =============================================================================

/** Field → messages, last-evaluated failure first. */
export type ValidationReport = Record<FieldKey, string[]>;

export type ValidationResult =
  | { ok: true }
  | { ok: false; error: { reason: "validation"; errors: ValidationReport } };

export type MissingInnerKeyPolicy = "report" | "throw";

export interface ContractValidatorOptions {
  /** Primitive + structural checks. Defaults to the built-in registry. */
  registry?: CheckRegistry;
  /** Maximum nesting of structural checks before aborting the pass */
  maxDepth?: number;
  /** Handling of inner map keys absent from the received map */
  missingInnerKey?: MissingInnerKeyPolicy;
  /** Emit pass/fail telemetry events from `valid()` */
  telemetry?: boolean;
}
