/**
 * @callbridge/bridge - Lifecycle tests
 */

import { describe, it, expect, vi } from "vitest";
import { serve } from "../src/lifecycle.js";
import { createTestLogger } from "./helpers.js";

function stubHost() {
  return { shutdown: vi.fn(async () => undefined) };
}

describe("serve", () => {
  it("should stop and shut down when the signal aborts", async () => {
    const host = stubHost();
    const { logger, capture } = createTestLogger();
    const controller = new AbortController();

    const serving = serve(host, { signal: controller.signal, signals: [], logger });
    expect(host.shutdown).not.toHaveBeenCalled();

    controller.abort();

    await expect(serving).resolves.toEqual({ kind: "abort" });
    expect(host.shutdown).toHaveBeenCalledTimes(1);
    expect(capture.messages("INFO")).toEqual(["Bridge ready", "Stopping bridge", "Bridge stopped"]);
  });

  it("should return at once for an already aborted signal", async () => {
    const host = stubHost();
    const controller = new AbortController();
    controller.abort();

    await expect(
      serve(host, { signal: controller.signal, signals: [], logger: createTestLogger().logger })
    ).resolves.toEqual({ kind: "abort" });
    expect(host.shutdown).toHaveBeenCalledTimes(1);
  });

  it("should stop on a process signal and remove its handlers", async () => {
    const host = stubHost();
    const before = process.listenerCount("SIGUSR2");

    const serving = serve(host, { signals: ["SIGUSR2"], logger: createTestLogger().logger });
    expect(process.listenerCount("SIGUSR2")).toBe(before + 1);

    process.emit("SIGUSR2", "SIGUSR2");

    await expect(serving).resolves.toEqual({ kind: "signal", signal: "SIGUSR2" });
    expect(process.listenerCount("SIGUSR2")).toBe(before);
    expect(host.shutdown).toHaveBeenCalledTimes(1);
  });

  it("should propagate shutdown failures", async () => {
    const host = {
      shutdown: vi.fn(async () => {
        throw new Error("close failed");
      }),
    };
    const controller = new AbortController();
    controller.abort();

    await expect(
      serve(host, { signal: controller.signal, signals: [], logger: createTestLogger().logger })
    ).rejects.toThrow("close failed");
  });
});
