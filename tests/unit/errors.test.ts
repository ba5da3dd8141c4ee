import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  buildErrorV1,
  validationReportToErrorV1,
  sanitizeErrorMessage,
  toErrorV1,
  getStatusCodeForErrorCode,
} from "../../src/utils/errors.js";
import {
  ContractDepthExceededError,
  ContractValidationError,
  MalformedNestedLookupError,
} from "../../src/validation/errors.js";
import { parseContract } from "../../src/validation/contract-schema.js";

describe("error utilities", () => {
  describe("buildErrorV1", () => {
    it("should build basic error with code and message", () => {
      const error = buildErrorV1("BAD_INPUT", "Invalid request");

      expect(error).toEqual({ schema: "error.v1", code: "BAD_INPUT", message: "Invalid request" });
    });

    it("should omit empty details", () => {
      expect(buildErrorV1("INTERNAL", "Server error", {}).details).toBeUndefined();
    });

    it("should include request_id when provided", () => {
      const error = buildErrorV1("INTERNAL", "Server error", undefined, "req-123");

      expect(error.request_id).toBe("req-123");
    });
  });

  describe("validationReportToErrorV1", () => {
    it("should carry the report under validation_errors", () => {
      const error = validationReportToErrorV1({ age: ["must be greater than 0", "has wrong type"] }, "req-1");

      expect(error).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "Contract validation failed",
        details: { validation_errors: { age: ["must be greater than 0", "has wrong type"] } },
        request_id: "req-1",
      });
    });
  });

  describe("sanitizeErrorMessage", () => {
    it("should strip paths, keys and email addresses", () => {
      expect(sanitizeErrorMessage("Failed to open /etc/app/config.json")).toBe("Failed to open [path]");
      expect(sanitizeErrorMessage("API_KEY=test-secret leaked")).toBe("[KEY_REDACTED] leaked");
      expect(sanitizeErrorMessage("CLIENT_SECRET=test-secret leaked")).toBe("[SECRET_REDACTED] leaked");
      expect(sanitizeErrorMessage("contact ops@example.com")).toBe("contact [email]");
    });
  });

  describe("toErrorV1", () => {
    it("should convert a contract validation failure", () => {
      const error = toErrorV1(new ContractValidationError({ a: ["is required"] }), "req-2");

      expect(error.code).toBe("BAD_INPUT");
      expect(error.message).toBe("Contract validation failed");
      expect(error.details).toEqual({ validation_errors: { a: ["is required"] } });
      expect(error.request_id).toBe("req-2");
    });

    it("should convert a malformed contract definition", () => {
      let caught: unknown;
      try {
        parseContract("not a contract");
      } catch (err) {
        caught = err;
      }

      expect(toErrorV1(caught)).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "Invalid contract definition",
        details: {
          issues: [{ code: "ZOD_INVALID_TYPE", path: "", message: "Expected array, received string" }],
        },
      });
    });

    it("should convert Zod errors", () => {
      const result = z.object({ n: z.number() }).safeParse({ n: "x" });
      expect(result.success).toBe(false);
      if (result.success) return;

      const error = toErrorV1(result.error);

      expect(error.code).toBe("BAD_INPUT");
      expect(error.message).toBe("Validation failed");
      expect(error.details).toEqual({
        validation_errors: { formErrors: [], fieldErrors: { n: ["Expected number, received string"] } },
      });
    });

    it("should name the field for fatal lookup and depth errors", () => {
      expect(toErrorV1(new MalformedNestedLookupError("map_param", "a"))).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "Malformed nested value",
        details: { field: "map_param", inner_key: "a" },
      });
      expect(toErrorV1(new ContractDepthExceededError("child", 1))).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "Nested contract too deep",
        details: { field: "child", max_depth: 1 },
      });
    });

    it("should sanitize generic errors", () => {
      expect(toErrorV1(new Error("boom at /srv/app/index.js")).message).toBe("boom at [path]");
      expect(toErrorV1(new Error("")).message).toBe("An unexpected error occurred");
      expect(toErrorV1("plain failure").message).toBe("plain failure");
    });

    it("should handle unknown error types", () => {
      const error = toErrorV1(42);

      expect(error.code).toBe("INTERNAL");
      expect(error.message).toBe("An unexpected error occurred");
      expect(error.details).toBeUndefined();
    });
  });

  describe("getStatusCodeForErrorCode", () => {
    it("should map codes to HTTP status", () => {
      expect(getStatusCodeForErrorCode("BAD_INPUT")).toBe(400);
      expect(getStatusCodeForErrorCode("INTERNAL")).toBe(500);
    });
  });
});
