/**
 * @fileoverview Tests for environment configuration loader.
 *
 * Exports:
 * - (none)
 *
 * Tests:
 * - setEnv (L14) - Helper to mutate process.env.
 * - loadConfig suite (L25) - Validation test cases.
 */

import { loadConfig, parsePositiveInteger } from "../config";

const setEnv = (env: Record<string, string | undefined>): void => {
  /* Replace process.env entries for test. */
  Object.entries(env).forEach(([key, value]) => {
    if (typeof value === "undefined") {
      delete process.env[key];
      return;
    }
    process.env[key] = value;
  });
};

describe("loadConfig", () => {
  /* Restore baseline environment after each test. */
  afterEach(() => {
    setEnv({ PORT: undefined, ENTRY_BUFFER_CAPACITY: undefined });
  });

  it("falls back to defaults when nothing is set", () => {
    setEnv({ PORT: undefined, ENTRY_BUFFER_CAPACITY: undefined });
    expect(loadConfig()).toEqual({ port: 3000, entryBufferCapacity: 100 });
  });

  it("parses configuration from environment", () => {
    setEnv({ PORT: "8080", ENTRY_BUFFER_CAPACITY: "25" });
    expect(loadConfig()).toEqual({ port: 8080, entryBufferCapacity: 25 });
  });

  it("rejects a zero capacity", () => {
    setEnv({ ENTRY_BUFFER_CAPACITY: "0" });
    expect(() => loadConfig()).toThrow("ENTRY_BUFFER_CAPACITY must be a positive integer: 0");
  });

  it("rejects a fractional port", () => {
    setEnv({ PORT: "80.5" });
    expect(() => loadConfig()).toThrow("PORT must be a positive integer: 80.5");
  });
});

describe("parsePositiveInteger", () => {
  it("treats blank input as unset", () => {
    expect(parsePositiveInteger("  ", "X")).toBeUndefined();
    expect(parsePositiveInteger(undefined, "X")).toBeUndefined();
  });

  it("rejects non-numeric input", () => {
    expect(() => parsePositiveInteger("many", "X")).toThrow("X must be a positive integer: many");
  });
});
