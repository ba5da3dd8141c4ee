/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so that
 * vi.stubEnv() calls are picked up by the config module, and clears
 * any telemetry sink or StatsD client a previous test installed.
 */

import { beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";
import { _resetTelemetryClient, setTestSink } from "./src/utils/telemetry.js";

beforeEach(() => {
  _resetConfigCache();
  _resetTelemetryClient();
  setTestSink(null);
});
