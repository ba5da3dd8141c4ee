/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 *
 * SECURITY: The engine logs field names and counts, never received
 * values. Redaction still covers secrets that callers pass in log
 * context (e.g. a failing check's configuration).
 */

import type { LoggerOptions } from "pino";

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.credentials",
  "*.accessToken",
  "*.access_token",
  "*.privateKey",
  "*.private_key",

  // PII fields
  "*.email",
  "*.phone",
  "*.ssn",
  "*.creditCard",
  "*.credit_card",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    level,
    redact: createRedactConfig(),
  };
}
