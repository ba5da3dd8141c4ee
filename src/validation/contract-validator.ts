/**
 * Contract Validator
 *
 * Walks a contract against received values, dispatches each declared
 * check through the registry and consolidates failures into a
 * per-field report. Structural `inner` checks recurse into nested maps
 * and lists with contracts synthesized on the fly.
 *
 * @module validation/contract-validator
 */

import { getConfig } from "../config/index.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { defaultRegistry } from "../checks/index.js";
import { consolidateErrors } from "./consolidate.js";
import {
  ContractDepthExceededError,
  ContractValidationError,
  MalformedNestedLookupError,
} from "./errors.js";
import { allValid, flattenOutcomes, fromCheckResult, invalid, VALID } from "./outcome.js";
import {
  checkEntries,
  findCheck,
  getField,
  isEmptyValue,
  isMapShaped,
  lookupField,
} from "./received.js";
import { resolveCheck } from "./registry.js";
import type {
  CheckName,
  CheckOutcome,
  CheckRegistry,
  CheckSet,
  CheckSpec,
  Contract,
  ContractValidatorOptions,
  DispatchResult,
  FieldKey,
  FieldSpec,
  MissingInnerKeyPolicy,
  ReceivedValues,
  ValidationResult,
} from "./types.js";

type EventLogLevel = "debug" | "info" | "warn";

export const INVALID_CONFIGURATION_MESSAGE = "has invalid check configuration";
export const MISSING_INNER_KEY_MESSAGE = "is required";

// =============================================================================
// Helper Functions
// =============================================================================

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCheckSet(value: unknown): value is CheckSet {
  if (isRecord(value)) return true;
  return (
    Array.isArray(value) &&
    value.every((entry) => Array.isArray(entry) && entry.length === 2 && typeof entry[0] === "string")
  );
}

function isRequired(checks: CheckSet): boolean {
  return Boolean(findCheck(checks, "required"));
}

function isAbsent(received: ReceivedValues, name: FieldKey): boolean {
  const lookup = lookupField(received, name);
  return !lookup.found || isEmptyValue(lookup.value);
}

/**
 * `inner` declarations for a map: inner key → that key's checks.
 */
function innerMapEntries(spec: CheckSpec): Array<readonly [FieldKey, CheckSpec]> | undefined {
  if (!isCheckSet(spec)) return undefined;
  return checkEntries(spec);
}

/**
 * `inner` declaration for a list: `{ name?, checks }`, or a bare check set.
 */
function innerListChecks(spec: CheckSpec): CheckSet | undefined {
  if (isRecord(spec) && "checks" in spec) {
    const { checks } = spec;
    return isCheckSet(checks) ? checks : undefined;
  }
  return isCheckSet(spec) ? spec : undefined;
}

// =============================================================================
// Validator
// =============================================================================

export class ContractValidator {
  private readonly registry: CheckRegistry;
  private readonly maxDepth: number;
  private readonly missingInnerKey: MissingInnerKeyPolicy;
  private readonly telemetry: boolean;

  constructor(options: ContractValidatorOptions = {}) {
    const { validation } = getConfig();
    this.registry = options.registry ?? defaultRegistry;
    this.maxDepth = options.maxDepth ?? validation.maxDepth;
    this.missingInnerKey = options.missingInnerKey ?? validation.missingInnerKey;
    this.telemetry = options.telemetry ?? validation.telemetryEnabled;
  }

  /**
   * Validate received values over a contract, accumulating every
   * check's outcome in contract order.
   *
   * Optional fields that were not supplied contribute nothing: none of
   * their checks run.
   */
  validate(contract: Contract, received: ReceivedValues): CheckOutcome[] {
    return this.walk(contract, received, 0);
  }

  /**
   * Whether received values satisfy a contract.
   *
   * @example
   * new ContractValidator().valid([{ name: "param", checks: { required: true } }], { param: "hello" })
   * // { ok: true }
   */
  valid(contract: Contract, received: ReceivedValues): ValidationResult {
    const startTime = Date.now();
    const outcomes = this.validate(contract, received);

    if (allValid(outcomes)) {
      this.record(TelemetryEvents.ContractValidationPassed, "debug", {
        fields: contract.length,
        outcomes: outcomes.length,
        duration_ms: Date.now() - startTime,
      });
      return { ok: true };
    }

    const errors = consolidateErrors(outcomes);
    this.record(TelemetryEvents.ContractValidationFailed, "info", {
      fields: contract.length,
      outcomes: outcomes.length,
      failed_fields: Object.keys(errors).length,
      failed_field_names: Object.keys(errors),
      duration_ms: Date.now() - startTime,
    });
    return { ok: false, error: { reason: "validation", errors } };
  }

  /**
   * Like `valid()`, but throws ContractValidationError on failure.
   */
  assertValid(contract: Contract, received: ReceivedValues): void {
    const result = this.valid(contract, received);
    if (!result.ok) {
      throw new ContractValidationError(result.error.errors);
    }
  }

  /**
   * Run one declared check against a field.
   *
   * `siblings` is the field's full check set; a structural check reads
   * its shape (`type`) from it.
   */
  dispatch(
    checkName: CheckName,
    checkSpec: CheckSpec,
    fieldName: FieldKey,
    received: ReceivedValues,
    siblings: CheckSet = {}
  ): CheckOutcome[] {
    return flattenOutcomes(this.dispatchAt(checkName, checkSpec, fieldName, received, siblings, 0));
  }

  private walk(contract: Contract, received: ReceivedValues, depth: number): CheckOutcome[] {
    const outcomes: CheckOutcome[] = [];

    for (const field of contract) {
      if (!isRequired(field.checks) && isAbsent(received, field.name)) {
        continue;
      }
      this.runChecks(field, received, depth, outcomes);
    }

    return outcomes;
  }

  private runChecks(
    field: FieldSpec,
    received: ReceivedValues,
    depth: number,
    into: CheckOutcome[]
  ): void {
    for (const [checkName, checkSpec] of checkEntries(field.checks)) {
      flattenOutcomes(
        this.dispatchAt(checkName, checkSpec, field.name, received, field.checks, depth),
        into
      );
    }
  }

  private dispatchAt(
    checkName: CheckName,
    checkSpec: CheckSpec,
    fieldName: FieldKey,
    received: ReceivedValues,
    siblings: CheckSet,
    depth: number
  ): DispatchResult {
    const impl = resolveCheck(this.registry, checkName);

    if (!impl) {
      log.debug(
        { event: "contract_validator.unknown_check", check: checkName, field: fieldName },
        "Ignoring unknown check"
      );
      return VALID;
    }

    if (impl.kind === "primitive") {
      return fromCheckResult(impl.fn(received, fieldName, checkSpec));
    }

    if (depth >= this.maxDepth) {
      this.record(TelemetryEvents.ContractDepthExceeded, "warn", { field: fieldName, max_depth: this.maxDepth });
      throw new ContractDepthExceededError(fieldName, this.maxDepth);
    }

    return findCheck(siblings, "type") === "list"
      ? this.checkInnerList(checkSpec, fieldName, received, depth)
      : this.checkInnerMap(checkSpec, fieldName, received, depth);
  }

  /**
   * Validate each declared inner key of a map-shaped value as its own
   * field. Outcomes are keyed by the inner key.
   */
  private checkInnerMap(
    spec: CheckSpec,
    fieldName: FieldKey,
    received: ReceivedValues,
    depth: number
  ): DispatchResult {
    const declarations = innerMapEntries(spec);
    if (!declarations) return invalid(fieldName, INVALID_CONFIGURATION_MESSAGE);

    // Not a map: the field's own type/required checks report it
    const innerReceived = getField(received, fieldName);
    if (!isMapShaped(innerReceived)) return VALID;

    const results: DispatchResult[] = [];
    for (const [innerKey, innerChecks] of declarations) {
      if (!isCheckSet(innerChecks)) {
        results.push(invalid(innerKey, INVALID_CONFIGURATION_MESSAGE));
        continue;
      }

      if (!lookupField(innerReceived, innerKey).found) {
        results.push(this.missingInner(fieldName, innerKey));
        continue;
      }

      const innerField: FieldSpec = { name: innerKey, checks: innerChecks };
      const innerOutcomes: CheckOutcome[] = [];
      this.runChecks(innerField, innerReceived, depth + 1, innerOutcomes);
      results.push(innerOutcomes);
    }
    return results;
  }

  /**
   * Validate every element of a list against the element contract.
   * Element `i` of `field` is validated as field `field_i`.
   */
  private checkInnerList(
    spec: CheckSpec,
    fieldName: FieldKey,
    received: ReceivedValues,
    depth: number
  ): DispatchResult {
    const elementChecks = innerListChecks(spec);
    if (!elementChecks) return invalid(fieldName, INVALID_CONFIGURATION_MESSAGE);

    const elements = getField(received, fieldName);
    if (!Array.isArray(elements)) return VALID;

    return elements.map((element: unknown, index) => {
      const name = `${fieldName}_${index}`;
      return this.walk([{ name, checks: elementChecks }], { [name]: element }, depth + 1);
    });
  }

  private missingInner(parentField: FieldKey, innerKey: FieldKey): DispatchResult {
    if (this.missingInnerKey === "report") {
      return invalid(innerKey, MISSING_INNER_KEY_MESSAGE);
    }
    this.record(TelemetryEvents.ContractLookupFailed, "warn", { field: parentField, inner_key: innerKey });
    throw new MalformedNestedLookupError(parentField, innerKey);
  }

  private record(event: string, level: EventLogLevel, data: Record<string, unknown>): void {
    log[level]({ event, ...data }, "Contract validation event");
    if (this.telemetry) {
      emit(event, data);
    }
  }
}

// =============================================================================
// Default entry points
// =============================================================================

/**
 * Validate with the default registry and configured options.
 */
export function validate(contract: Contract, received: ReceivedValues): CheckOutcome[] {
  return new ContractValidator().validate(contract, received);
}

/**
 * @example
 * valid([{ name: "param", checks: { required: true, type: "string" } }], { param: "hello" })
 * // { ok: true }
 */
export function valid(contract: Contract, received: ReceivedValues): ValidationResult {
  return new ContractValidator().valid(contract, received);
}

export function assertValid(contract: Contract, received: ReceivedValues): void {
  new ContractValidator().assertValid(contract, received);
}
