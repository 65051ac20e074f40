import { describe, expect, it } from "vitest";
import { ConversionError } from "../../core/errors.js";
import { resolveConfig } from "../config.js";

function configError(fn: () => unknown): ConversionError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConversionError) return e;
    throw e;
  }
  throw new Error("expected a ConversionError");
}

describe("resolveConfig", () => {
  it("defaults to info and 100000", () => {
    expect(resolveConfig({}, {})).toEqual({ logLevel: "info", progressInterval: 100_000 });
  });

  it("reads the environment", () => {
    expect(resolveConfig({}, { LOG_LEVEL: "WARN", PROGRESS_INTERVAL: "250" })).toEqual({
      logLevel: "warn",
      progressInterval: 250,
    });
  });

  it("lets flags override the environment", () => {
    const env = { LOG_LEVEL: "debug", PROGRESS_INTERVAL: "250" };
    expect(resolveConfig({ logLevel: "error", progressInterval: "10" }, env)).toEqual({
      logLevel: "error",
      progressInterval: 10,
    });
  });

  it("switches to debug when DEBUG is set", () => {
    expect(resolveConfig({}, { DEBUG: "1", LOG_LEVEL: "warn" }).logLevel).toBe("debug");
    expect(resolveConfig({}, { DEBUG: "0", LOG_LEVEL: "warn" }).logLevel).toBe("warn");
    expect(resolveConfig({ logLevel: "silent" }, { DEBUG: "true" }).logLevel).toBe("silent");
  });

  it("collects every invalid field", () => {
    const err = configError(() => resolveConfig({ logLevel: "loud", progressInterval: "0" }, {}));
    expect(err.code).toBe("INVALID_ARGUMENT");
    expect(err.message).toBe("Invalid argument: invalid configuration");
    expect(err.errors).toEqual([
      { path: "$.logLevel", message: "must be one of: debug, info, warn, error, silent" },
      { path: "$.progressInterval", message: "must be a positive integer" },
    ]);
  });

  it("rejects a fractional interval from the environment", () => {
    const err = configError(() => resolveConfig({}, { PROGRESS_INTERVAL: "1.5" }));
    expect(err.errors).toEqual([{ path: "$.progressInterval", message: "must be a positive integer" }]);
  });
});
