import { describe, it, expect } from "vitest";
import { consolidateErrors, errorsMessage } from "../../src/validation/consolidate.js";
import { VALID, invalid } from "../../src/validation/outcome.js";

describe("consolidateErrors", () => {
  it("returns an empty report when nothing failed", () => {
    expect(consolidateErrors([])).toEqual({});
    expect(consolidateErrors([VALID, VALID])).toEqual({});
  });

  it("orders a field's messages from last-evaluated to first", () => {
    const report = consolidateErrors([invalid("f", "m1"), VALID, invalid("f", "m3")]);

    expect(report).toEqual({ f: ["m3", "m1"] });
  });

  it("keeps fields separate", () => {
    const report = consolidateErrors([
      invalid("a", "is required"),
      invalid("b", "has wrong type"),
      invalid("a", "has invalid format"),
    ]);

    expect(report).toEqual({
      a: ["has invalid format", "is required"],
      b: ["has wrong type"],
    });
  });

  it("keeps a field named __proto__ as an ordinary key", () => {
    const report = consolidateErrors([invalid("__proto__", "is required"), invalid("a", "has wrong type")]);

    expect(Object.keys(report)).toEqual(["__proto__", "a"]);
    expect(Object.getOwnPropertyDescriptor(report, "__proto__")?.value).toEqual(["is required"]);
    expect(errorsMessage(report)).toBe("__proto__: is required\na: has wrong type");
  });

  it("does not modify the outcomes it is given", () => {
    const outcomes = [invalid("a", "x"), invalid("a", "y")];
    const snapshot = JSON.stringify(outcomes);

    consolidateErrors(outcomes);

    expect(JSON.stringify(outcomes)).toBe(snapshot);
  });
});

describe("errorsMessage", () => {
  it("renders one line per field with tab-indented continuation lines", () => {
    const message = errorsMessage({
      a: ["has invalid format", "is required"],
      b: ["has wrong type"],
    });

    expect(message).toBe("a: has invalid format\n\tis required\nb: has wrong type");
  });

  it("renders an empty report as an empty string", () => {
    expect(errorsMessage({})).toBe("");
  });

  it("renders the same text for the same outcomes", () => {
    const outcomes = [invalid("x", "one"), invalid("y", "two"), invalid("x", "three")];

    expect(errorsMessage(consolidateErrors(outcomes))).toBe(errorsMessage(consolidateErrors(outcomes)));
    expect(errorsMessage(consolidateErrors(outcomes))).toBe("x: three\n\tone\ny: two");
  });
});
