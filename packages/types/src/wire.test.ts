import { describe, it, expect } from "vitest";
import { parseRpcResponse } from "./wire.js";
import { checkBridgeConfig } from "./config.js";

describe("@callbridge/types - Wire Envelopes", () => {
  it("should accept a success reply", () => {
    expect(parseRpcResponse({ result: '{"version":"1.0"}' })).toEqual({
      success: true,
      data: { result: '{"version":"1.0"}' },
    });
  });

  it("should accept a failure reply", () => {
    const result = parseRpcResponse({ error: { code: "UNAVAILABLE", message: "node offline" } });
    expect(result).toEqual({
      success: true,
      data: { error: { code: "UNAVAILABLE", message: "node offline" } },
    });
  });

  it("should reject replies with neither result nor error", () => {
    expect(parseRpcResponse({ status: "ok" }).success).toBe(false);
    expect(parseRpcResponse("plain text").success).toBe(false);
  });
});

describe("@callbridge/types - Bridge Configuration", () => {
  it("should accept non-negative integer timeouts", () => {
    expect(
      checkBridgeConfig({ invokeTimeout: 0, connectTimeout: 15_000, closeTimeout: 5_000 }).success
    ).toBe(true);
  });

  it("should reject negative or fractional timeouts", () => {
    const result = checkBridgeConfig({ invokeTimeout: -1, connectTimeout: 1.5, closeTimeout: 0 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues.map((i) => i.path).sort()).toEqual(["connectTimeout", "invokeTimeout"]);
    }
  });
});
