/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * Invalid configurations fail fast on first access. Tests reset the
 * cached value with `_resetConfigCache()` after stubbing env vars.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val); // fallback
  });

/**
 * Empty env vars count as unset so that defaults apply
 */
function emptyAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => (val === "" ? undefined : val), schema);
}

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * What to do when an `inner` map declares a key the received map lacks.
 * - report: emit an "is required" failure for the inner key
 * - throw: raise MalformedNestedLookupError
 *
 * Case-insensitive.
 */
const MissingInnerKeyPolicy = z
  .union([z.string(), z.undefined()])
  .transform((val, ctx): "report" | "throw" => {
    if (!val) return "report";
    const lower = val.toLowerCase().trim();
    if (lower === "report" || lower === "throw") return lower;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected "report" or "throw", received "${val}"`,
    });
    return z.NEVER;
  });

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    nodeEnv: emptyAsUnset(Environment.default("development")),
    logLevel: emptyAsUnset(LogLevel.default("info")),
  }),

  validation: z.object({
    maxDepth: emptyAsUnset(z.coerce.number().int().positive().default(32)),
    missingInnerKey: MissingInnerKeyPolicy,
    telemetryEnabled: emptyAsUnset(booleanString.default(true)),
  }),

  telemetry: z.object({
    datadogHost: emptyAsUnset(z.string().optional()),
    datadogPort: emptyAsUnset(z.coerce.number().int().positive().default(8125)),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
    },
    validation: {
      maxDepth: env.VALIDATION_MAX_DEPTH,
      missingInnerKey: env.VALIDATION_MISSING_INNER_KEY,
      telemetryEnabled: env.VALIDATION_TELEMETRY_ENABLED,
    },
    telemetry: {
      datadogHost: env.DD_AGENT_HOST,
      datadogPort: env.DD_AGENT_PORT,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing it on first access.
 *
 * Deferring the parse lets tests set environment variables before
 * anything reads them.
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
