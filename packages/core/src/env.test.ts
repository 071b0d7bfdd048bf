import { describe, it, expect, expectTypeOf, afterEach } from "vitest";
import {
  getEnv,
  getEnvNumber,
  getEnvBoolean,
  setEnvOverrides,
  clearEnvOverrides,
  createEnvConfig,
} from "./env.js";

describe("@callbridge/core - Environment", () => {
  afterEach(() => {
    clearEnvOverrides();
  });

  it("should prefer overrides over process.env", () => {
    setEnvOverrides({ CALLBRIDGE_TEST_VALUE: "override" });
    expect(getEnv("CALLBRIDGE_TEST_VALUE")).toBe("override");
  });

  it("should fall back to defaults", () => {
    expect(getEnv("CALLBRIDGE_UNSET_VALUE", "fallback")).toBe("fallback");
    expect(getEnvNumber("CALLBRIDGE_UNSET_VALUE", 5)).toBe(5);
    expect(getEnvBoolean("CALLBRIDGE_UNSET_VALUE", true)).toBe(true);
  });

  it("should parse numbers and booleans", () => {
    setEnvOverrides({ N: "1500", BAD: "abc", FLAG: "yes", OFF: "no" });
    expect(getEnvNumber("N")).toBe(1500);
    expect(getEnvNumber("BAD", 7)).toBe(7);
    expect(getEnvBoolean("FLAG")).toBe(true);
    expect(getEnvBoolean("OFF", true)).toBe(false);
  });

  it("should type a defaulted lookup as a string", () => {
    const value = getEnv("CALLBRIDGE_UNSET_VALUE", "fallback");

    expectTypeOf(value).toEqualTypeOf<string>();
    expect(value.length).toBe(8);
  });

  it("should build typed configuration objects", () => {
    setEnvOverrides({ CALLBRIDGE_INVOKE_TIMEOUT: "250" });
    const env = createEnvConfig({
      CALLBRIDGE_INVOKE_TIMEOUT: { type: "number", default: 0 },
      CALLBRIDGE_DEV_MODE: { type: "boolean", default: false },
      CALLBRIDGE_ADDRESS: { default: "relay.example:443" },
    });

    expect(env).toEqual({
      CALLBRIDGE_INVOKE_TIMEOUT: 250,
      CALLBRIDGE_DEV_MODE: false,
      CALLBRIDGE_ADDRESS: "relay.example:443",
    });
  });
});
