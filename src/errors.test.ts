import { describe, expect, it } from "vitest";
import { ConfigError, StackplanError, errorMessage, formatError } from "./errors.js";

describe("errors", () => {
  it("formats tool errors with their code", () => {
    expect(formatError(new ConfigError("Invalid config", ["state.path: Required"]))).toBe(
      "Error [CONFIG_INVALID]: Invalid config: state.path: Required",
    );
  });

  it("formats anything else plainly", () => {
    expect(formatError(new TypeError("bad"))).toBe("Error: bad");
    expect(formatError("oops")).toBe("Error: oops");
    expect(errorMessage(42)).toBe("42");
  });

  it("serializes to JSON", () => {
    const err = new StackplanError("NOT_FOUND", 'Resource "a.b" not found', { name: "a.b" });
    expect(err.name).toBe("StackplanError");
    expect(JSON.parse(JSON.stringify(err))).toEqual({
      name: "StackplanError",
      code: "NOT_FOUND",
      message: 'Resource "a.b" not found',
      details: { name: "a.b" },
    });
  });

  it("names subclasses after themselves", () => {
    const err = new ConfigError("Invalid config");
    expect(err.name).toBe("ConfigError");
    expect(err.issues).toEqual([]);
    expect(err.message).toBe("Invalid config");
  });
});
