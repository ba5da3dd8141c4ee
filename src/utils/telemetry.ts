import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";
import { getConfig } from "../config/index.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Redaction paths centralized in src/utils/logger-config.ts.
 * Reads LOG_LEVEL directly so importing the logger never parses config.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

/**
 * Test sink for capturing telemetry events in tests
 * Only usable when NODE_ENV=test or VITEST=true
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  // Direct env check: config may be deliberately invalid in the test that installs the sink
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT modify these names without updating dashboards
 */
export const TelemetryEvents = {
  ContractValidationPassed: "contract.validation.passed",
  ContractValidationFailed: "contract.validation.failed",
  ContractDepthExceeded: "contract.validation.depth_exceeded",
  ContractLookupFailed: "contract.validation.lookup_failed",
} as const;

/**
 * All valid event names (for CI validation)
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST).
 * Created on first emit so that config is read after test env stubs.
 */
let datadogClient: StatsD | null | undefined;

function getDatadogClient(): StatsD | null {
  if (datadogClient !== undefined) return datadogClient;

  const { telemetry, server } = getConfig();
  if (!telemetry.datadogHost) {
    datadogClient = null;
    return datadogClient;
  }

  datadogClient = new StatsD({
    host: telemetry.datadogHost,
    port: telemetry.datadogPort,
    prefix: "contracts.",
    globalTags: { env: server.nodeEnv },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: telemetry.datadogHost }, "Datadog StatsD client initialized");
  return datadogClient;
}

/**
 * Drop the cached StatsD client (for testing only)
 *
 * @internal
 */
export function _resetTelemetryClient(): void {
  datadogClient?.close();
  datadogClient = undefined;
}

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (isPlainRecord(value)) {
    return sanitizeTelemetryData(value);
  }

  // Functions, symbols, bigints
  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit a telemetry event
 *
 * Sanitizes data to JSON-safe leaves, forwards to the test sink and
 * records Datadog metrics when configured. Callers log the event
 * themselves at the level it deserves.
 */
export function emit(event: string, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  const client = getDatadogClient();
  if (!client) return;

  try {
    switch (event) {
      case TelemetryEvents.ContractValidationPassed: {
        client.increment("validation.passed", 1);
        break;
      }

      case TelemetryEvents.ContractValidationFailed: {
        client.increment("validation.failed", 1);
        if (typeof eventData.failed_fields === "number") {
          client.gauge("validation.failed_fields", eventData.failed_fields);
        }
        break;
      }

      case TelemetryEvents.ContractDepthExceeded:
      case TelemetryEvents.ContractLookupFailed: {
        client.increment("validation.fatal", 1, { event });
        break;
      }

      default:
        break;
    }
  } catch (error) {
    // Metrics are best-effort; the validation result stands
    log.warn({ error, event }, "Failed to record Datadog metric");
  }
}
