/**
 * Contract Schema
 *
 * Zod schema for contracts that arrive as untrusted data (e.g. parsed
 * JSON). Only the outer shape is checked: check specs stay opaque.
 *
 * @module validation/contract-schema
 */

import { z, type ZodError, type ZodIssue } from "zod";
import { ContractDefinitionError, type ContractDefinitionIssue } from "./errors.js";
import type { Contract } from "./types.js";

const CheckTuple = z.tuple([z.string(), z.unknown()]);

export const CheckSetSchema = z.union([z.array(CheckTuple), z.record(z.unknown())]);

export const FieldSpecSchema = z.object({
  name: z.string().min(1),
  checks: CheckSetSchema,
});

export const ContractSchema = z.array(FieldSpecSchema);

export type ContractParseResult =
  | { ok: true; contract: Contract }
  | { ok: false; issues: ContractDefinitionIssue[] };

/**
 * Map Zod issue code to a contract definition error code.
 */
function mapZodCodeToErrorCode(issue: ZodIssue): string {
  switch (issue.code) {
    case "invalid_type":
      return "ZOD_INVALID_TYPE";
    case "invalid_union":
      return "ZOD_INVALID_UNION";
    case "too_small":
      return "ZOD_TOO_SMALL";
    case "too_big":
      return "ZOD_TOO_BIG";
    case "custom":
      return "ZOD_CUSTOM_ERROR";
    default:
      return "ZOD_VALIDATION_ERROR";
  }
}

/**
 * Convert Zod path to a JSON pointer-style string.
 * e.g., [0, "checks"] → "[0].checks"
 */
function formatZodPath(path: (string | number)[]): string {
  return path.reduce<string>((acc, segment, index) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`;
    }
    return index === 0 ? segment : `${acc}.${segment}`;
  }, "");
}

function describeIssue(issue: ZodIssue, path: string): string {
  const location = path ? ` at ${path}` : "";

  switch (issue.code) {
    case "invalid_type":
      return `Expected ${issue.expected}, received ${issue.received}${location}`;
    case "invalid_union":
      return `Checks${location} must be an object or a list of [name, spec] pairs`;
    case "too_small":
      return `Field name${location} must not be empty`;
    default:
      return issue.message || `Invalid contract${location}`;
  }
}

/**
 * Convert a ZodError to contract definition issues.
 */
export function zodToContractIssues(zodError: ZodError): ContractDefinitionIssue[] {
  return zodError.issues.map((issue) => {
    const path = formatZodPath(issue.path);
    return {
      code: mapZodCodeToErrorCode(issue),
      path,
      message: describeIssue(issue, path),
    };
  });
}

export function safeParseContract(input: unknown): ContractParseResult {
  const result = ContractSchema.safeParse(input);
  if (!result.success) {
    return { ok: false, issues: zodToContractIssues(result.error) };
  }
  return { ok: true, contract: result.data };
}

/**
 * Check that `input` has the shape of a contract.
 *
 * @throws ContractDefinitionError
 */
export function parseContract(input: unknown): Contract {
  const result = safeParseContract(input);
  if (!result.ok) {
    throw new ContractDefinitionError(result.issues);
  }
  return result.contract;
}
