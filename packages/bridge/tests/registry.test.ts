/**
 * @callbridge/bridge - Registry tests
 */

import { describe, it, expect } from "vitest";
import { MethodRegistry, buildRegistry } from "../src/registry.js";
import {
  DuplicateMethodError,
  MethodNotFoundError,
  RegistrySealedError,
} from "../src/errors.js";
import type { InvokerFunction, RegistrationUnit } from "../src/types.js";
import { createTestLogger } from "./helpers.js";

const echo: InvokerFunction = (_ctx, _conn, request, done) => done(request, null);
const other: InvokerFunction = (_ctx, _conn, _request, done) => done("{}", null);

function unit(name: string, methods: string[]): RegistrationUnit {
  return {
    name,
    registerInto(registry) {
      for (const method of methods) {
        registry.register(method, echo);
      }
    },
  };
}

describe("MethodRegistry", () => {
  it("should resolve registered methods", () => {
    const registry = new MethodRegistry();
    registry.register("GetInfo", echo);

    expect(registry.resolve("GetInfo")).toBe(echo);
    expect(registry.has("GetInfo")).toBe(true);
    expect(registry.size).toBe(1);
  });

  it("should return undefined for unknown names", () => {
    const registry = new MethodRegistry();
    registry.register("GetInfo", echo);

    expect(registry.resolve("Bogus")).toBeUndefined();
    expect(registry.has("Bogus")).toBe(false);
  });

  it("should throw MethodNotFoundError from require", () => {
    const registry = new MethodRegistry();

    expect(() => registry.require("Bogus")).toThrow(MethodNotFoundError);
    expect(() => registry.require("Bogus")).toThrow("rpc with name Bogus not found");
  });

  it("should keep registration order", () => {
    const registry = new MethodRegistry();
    registry.register("b.Second", echo);
    registry.register("a.First", other);

    expect(registry.names()).toEqual(["b.Second", "a.First"]);
  });

  it("should reject duplicate names", () => {
    const registry = new MethodRegistry();
    registry.register("GetInfo", echo);

    expect(() => registry.register("GetInfo", other)).toThrow(DuplicateMethodError);
    expect(registry.resolve("GetInfo")).toBe(echo);
  });

  it("should reject empty names", () => {
    const registry = new MethodRegistry();

    expect(() => registry.register("", echo)).toThrow(TypeError);
  });

  it("should name the unit on duplicates across units", () => {
    const registry = new MethodRegistry();
    registry.apply(unit("lightning", ["lnrpc.Lightning.GetInfo"]));

    try {
      registry.apply(unit("copy", ["lnrpc.Lightning.GetInfo"]));
      expect.fail("expected DuplicateMethodError");
    } catch (error) {
      expect(error).toBeInstanceOf(DuplicateMethodError);
      if (error instanceof DuplicateMethodError) {
        expect(error.code).toBe("DUPLICATE_METHOD");
        expect(error.details).toEqual({ method: "lnrpc.Lightning.GetInfo", unit: "copy" });
      }
    }
  });

  it("should refuse writes after seal", () => {
    const registry = new MethodRegistry();
    registry.register("GetInfo", echo);
    registry.seal();

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register("Other", echo)).toThrow(RegistrySealedError);
    expect(() => registry.apply(unit("late", ["Late"]))).toThrow(RegistrySealedError);
    expect(registry.names()).toEqual(["GetInfo"]);
  });
});

describe("buildRegistry", () => {
  it("should apply units in order and seal", () => {
    const { logger, capture } = createTestLogger();
    const registry = buildRegistry(
      [unit("lightning", ["lnrpc.Lightning.GetInfo", "lnrpc.Lightning.ListPeers"]), unit("router", ["routerrpc.Router.SendPaymentV2"])],
      { logger }
    );

    expect(registry.names()).toEqual([
      "lnrpc.Lightning.GetInfo",
      "lnrpc.Lightning.ListPeers",
      "routerrpc.Router.SendPaymentV2",
    ]);
    expect(registry.size).toBe(3);
    expect(registry instanceof MethodRegistry && registry.isSealed).toBe(true);

    const info = capture.entries.find((e) => e.message === "Method registry sealed");
    expect(info?.context).toEqual({ module: "test", units: 2, methods: 3 });
    expect(capture.messages("DEBUG")).toEqual(["Registered lightning", "Registered router"]);
  });

  it("should fail startup on collisions between units", () => {
    const { logger } = createTestLogger();

    expect(() =>
      buildRegistry([unit("a", ["Shared"]), unit("b", ["Shared"])], { logger })
    ).toThrow("Method already registered: Shared");
  });

  it("should build an empty registry", () => {
    const { logger } = createTestLogger();
    const registry = buildRegistry([], { logger });

    expect(registry.size).toBe(0);
    expect(registry.resolve("GetInfo")).toBeUndefined();
  });
});
