import { ZodError } from "zod";
import {
  ContractDefinitionError,
  ContractDepthExceededError,
  ContractValidationError,
  MalformedNestedLookupError,
} from "../validation/errors.js";
import type { ValidationReport } from "../validation/types.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert a validation report to ErrorV1
 */
export function validationReportToErrorV1(report: ValidationReport, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Contract validation failed",
    { validation_errors: report },
    requestId
  );
}

/**
 * Strip file paths, secrets and email addresses from a message
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, "[path]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[A-Z_]+_?SECRET=\S+/gi, "[SECRET_REDACTED]")
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, requestId?: string): ErrorV1 {
  if (error instanceof ContractValidationError) {
    return validationReportToErrorV1(error.errors, requestId);
  }

  if (error instanceof ContractDefinitionError) {
    return buildErrorV1("BAD_INPUT", "Invalid contract definition", { issues: error.issues }, requestId);
  }

  // Zod validation errors
  if (error instanceof ZodError) {
    return buildErrorV1("BAD_INPUT", "Validation failed", { validation_errors: error.flatten() }, requestId);
  }

  // Fatal engine conditions: safe to name, never the received values
  if (error instanceof MalformedNestedLookupError) {
    return buildErrorV1(
      "INTERNAL",
      "Malformed nested value",
      { field: error.parentField, inner_key: error.innerKey },
      requestId
    );
  }

  if (error instanceof ContractDepthExceededError) {
    return buildErrorV1(
      "INTERNAL",
      "Nested contract too deep",
      { field: error.field, max_depth: error.maxDepth },
      requestId
    );
  }

  if (error instanceof Error) {
    return buildErrorV1(
      "INTERNAL",
      sanitizeErrorMessage(error.message || "An unexpected error occurred"),
      undefined,
      requestId
    );
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", sanitizeErrorMessage(error), undefined, requestId);
  }

  // Unknown error type - minimal info
  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "INTERNAL":
    default:
      return 500;
  }
}
