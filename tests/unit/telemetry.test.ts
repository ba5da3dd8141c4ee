import { describe, it, expect, vi, afterEach } from "vitest";
import { StatsD } from "hot-shots";
import {
  _resetTelemetryClient,
  emit,
  setTestSink,
  TelemetryEvents,
  VALID_EVENT_NAMES,
  type TelemetryShape,
} from "../../src/utils/telemetry.js";
import { createLoggerConfig, REDACT_CENSOR } from "../../src/utils/logger-config.js";

describe("telemetry", () => {
  it("should register every frozen event name", () => {
    expect([...VALID_EVENT_NAMES].sort()).toEqual([
      "contract.validation.depth_exceeded",
      "contract.validation.failed",
      "contract.validation.lookup_failed",
      "contract.validation.passed",
    ]);
  });

  it("should forward sanitized event data to the test sink", () => {
    const events: Array<{ name: string; data: TelemetryShape }> = [];
    setTestSink((name, data) => {
      events.push({ name, data });
    });

    emit(TelemetryEvents.ContractValidationFailed, {
      failed_fields: 1,
      check: () => true,
      nested: { field: "age", skipped: undefined },
      names: ["age", ["nested"], { field: "name" }],
    });

    expect(events).toEqual([
      {
        name: "contract.validation.failed",
        data: {
          failed_fields: 1,
          nested: { field: "age" },
          names: ["age", { field: "name" }],
        },
      },
    ]);
  });

  it("should not call a cleared sink", () => {
    const sink = vi.fn();
    setTestSink(sink);
    setTestSink(null);

    emit(TelemetryEvents.ContractValidationPassed, { fields: 1 });

    expect(sink).not.toHaveBeenCalled();
  });

  it("should refuse a test sink outside the test environment", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("VITEST", "");

    expect(() => setTestSink(() => {})).toThrow("setTestSink() can only be used in test environment");
  });
});

describe("Datadog metrics", () => {
  afterEach(() => {
    _resetTelemetryClient();
    vi.restoreAllMocks();
  });

  it("should count each event and gauge failed fields", () => {
    vi.stubEnv("DD_AGENT_HOST", "127.0.0.1");
    const increment = vi.spyOn(StatsD.prototype, "increment").mockImplementation(() => {});
    const gauge = vi.spyOn(StatsD.prototype, "gauge").mockImplementation(() => {});

    emit(TelemetryEvents.ContractValidationPassed, { fields: 1 });
    emit(TelemetryEvents.ContractValidationFailed, { failed_fields: 2 });
    emit(TelemetryEvents.ContractDepthExceeded, { field: "child" });
    emit(TelemetryEvents.ContractLookupFailed, { field: "map_param" });

    expect(increment.mock.calls).toEqual([
      ["validation.passed", 1],
      ["validation.failed", 1],
      ["validation.fatal", 1, { event: "contract.validation.depth_exceeded" }],
      ["validation.fatal", 1, { event: "contract.validation.lookup_failed" }],
    ]);
    expect(gauge.mock.calls).toEqual([["validation.failed_fields", 2]]);
  });

  it("should send nothing without an agent host", () => {
    const increment = vi.spyOn(StatsD.prototype, "increment").mockImplementation(() => {});

    emit(TelemetryEvents.ContractValidationPassed, { fields: 1 });

    expect(increment).not.toHaveBeenCalled();
  });
});

describe("logger config", () => {
  it("should set the level and redact secrets", () => {
    const config = createLoggerConfig("warn");

    expect(config.level).toBe("warn");
    expect(config.redact).toEqual(expect.objectContaining({ censor: REDACT_CENSOR }));
    expect(config.redact).toEqual(
      expect.objectContaining({ paths: expect.arrayContaining(["*.password", "*.api_key", "*.email"]) })
    );
  });
});
