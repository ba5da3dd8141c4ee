/**
 * Checks module
 *
 * Default primitive check library and the registry built from it.
 */

import { createCheckRegistry } from "../validation/registry.js";
import type { CheckFn, CheckName, CheckRegistry } from "../validation/types.js";
import {
  checkEquals,
  checkFormat,
  checkFunc,
  checkIn,
  checkLength,
  checkNotIn,
  checkNumericality,
  checkRequired,
  checkType,
} from "./primitive-checks.js";

export const DEFAULT_CHECKS: Readonly<Record<CheckName, CheckFn>> = Object.freeze({
  required: checkRequired,
  type: checkType,
  numericality: checkNumericality,
  equals: checkEquals,
  in: checkIn,
  not_in: checkNotIn,
  format: checkFormat,
  length: checkLength,
  func: checkFunc,
});

/** Built once at load; shared read-only by every validator. */
export const defaultRegistry: CheckRegistry = createCheckRegistry(DEFAULT_CHECKS);

export {
  checkEquals,
  checkFormat,
  checkFunc,
  checkIn,
  checkLength,
  checkNotIn,
  checkNumericality,
  checkRequired,
  checkType,
  INVALID_SPEC_MESSAGE,
  type FuncCheckSpec,
  type TypeName,
} from "./primitive-checks.js";
