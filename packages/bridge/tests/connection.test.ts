/**
 * @callbridge/bridge - Connection lifecycle tests
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@callbridge/core";
import { ConnectionManager } from "../src/connection.js";
import { ConnectionError, TransportError } from "../src/errors.js";
import { TimeoutExceededError } from "../src/timeout.js";
import { MemoryTransport } from "../src/transports/memory.js";
import type { ConnectionState } from "../src/types.js";
import { ControlledTransport, StubConnection, createTestLogger } from "./helpers.js";

const ADDRESS = "relay.example:443";

function setup() {
  const { logger, capture } = createTestLogger();
  const transport = new MemoryTransport({
    secret: "correct-secret",
    methods: { GetInfo: () => '{"version":"1.0"}' },
  });
  const manager = new ConnectionManager({ transport, logger });
  return { manager, transport, capture };
}

describe("ConnectionManager", () => {
  it("should start disconnected", () => {
    const { manager } = setup();

    expect(manager.state).toBe("disconnected");
    expect(manager.isConnected()).toBe(false);
    expect(manager.current()).toBeUndefined();
  });

  it("should connect with the correct secret", async () => {
    const { manager, capture } = setup();
    const handle = await manager.connect(ADDRESS, false, "correct-secret");

    expect(manager.state).toBe("connected");
    expect(manager.isConnected()).toBe(true);
    expect(manager.current()).toBe(handle);
    expect(handle.address).toBe(ADDRESS);
    expect(capture.messages("INFO")).toContain("Connected");
  });

  it("should fail with the wrong secret and stay disconnected", async () => {
    const { manager, capture } = setup();

    await expect(manager.connect(ADDRESS, false, "wrong-secret")).rejects.toThrow(
      "Pairing rejected by relay.example:443: invalid secret"
    );
    expect(manager.state).toBe("disconnected");
    expect(manager.isConnected()).toBe(false);
    expect(capture.messages("ERROR")).toEqual(["Connect failed"]);
  });

  it("should validate arguments before opening", async () => {
    const { manager, transport } = setup();

    await expect(manager.connect("relay.example", false, "correct-secret")).rejects.toThrow(
      ValidationError
    );
    await expect(manager.connect(ADDRESS, false, "")).rejects.toThrow("Invalid connect parameters");
    expect(transport.openCount).toBe(0);
    expect(manager.state).toBe("disconnected");
  });

  it("should warn when certificate checks are relaxed", async () => {
    const { manager, capture } = setup();
    const handle = await manager.connect(ADDRESS, true, "correct-secret");

    expect(handle.insecure).toBe(true);
    expect(capture.messages("WARN")).toEqual([
      "TLS certificate validation disabled for this connection; use only with development endpoints",
    ]);
  });

  it("should close the previous handle when connecting again", async () => {
    const { manager, transport } = setup();
    const first = await manager.connect(ADDRESS, false, "correct-secret");
    const second = await manager.connect(ADDRESS, false, "correct-secret");

    expect(second).not.toBe(first);
    expect(manager.current()).toBe(second);
    expect(transport.openConnections).toBe(1);
    await expect(first.call("GetInfo", "{}")).rejects.toThrow("Connection is closed");
    await expect(second.call("GetInfo", "{}")).resolves.toBe('{"version":"1.0"}');
  });

  it("should reject a connect while another is in flight", async () => {
    const transport = new ControlledTransport();
    const { logger } = createTestLogger();
    const manager = new ConnectionManager({ transport, logger });

    const pending = manager.connect(ADDRESS, false, "correct-secret");

    try {
      await manager.connect(ADDRESS, false, "correct-secret");
      expect.fail("expected ConnectionError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.code).toBe("CONNECT_IN_PROGRESS");
      }
    }

    const stub = new StubConnection("conn-1", ADDRESS);
    transport.last().pending.resolve(stub);
    await expect(pending).resolves.toBe(stub);
    expect(transport.requests).toHaveLength(1);
  });

  it("should wrap transport failures in ConnectionError", async () => {
    const transport = new ControlledTransport();
    const { logger } = createTestLogger();
    const manager = new ConnectionManager({ transport, logger });

    const pending = manager.connect(ADDRESS, false, "correct-secret");
    transport.last().pending.reject(new Error("connect ECONNREFUSED"));

    await expect(pending).rejects.toThrow(
      "Unable to connect to relay.example:443: connect ECONNREFUSED"
    );
    expect(manager.state).toBe("disconnected");
  });

  it("should time out a connect that never completes", async () => {
    const transport = new ControlledTransport();
    const { logger } = createTestLogger();
    const manager = new ConnectionManager({ transport, logger, config: { connectTimeout: 20 } });

    await expect(manager.connect(ADDRESS, false, "correct-secret")).rejects.toThrow(
      "Connect to relay.example:443 timed out after 20ms"
    );

    const { signal } = transport.last().params;
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(TimeoutExceededError);
    expect(manager.isConnected()).toBe(false);
  });

  it("should close a handle that arrives after the connect timed out", async () => {
    const transport = new ControlledTransport();
    const { logger } = createTestLogger();
    const manager = new ConnectionManager({ transport, logger, config: { connectTimeout: 20 } });

    await expect(manager.connect(ADDRESS, false, "correct-secret")).rejects.toThrow("timed out");

    const late = new StubConnection("conn-late", ADDRESS);
    transport.last().pending.resolve(late);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(late.closeCalls).toBe(1);
    expect(manager.isConnected()).toBe(false);
    expect(manager.current()).toBeUndefined();
  });

  it("should treat disconnect as idempotent", async () => {
    const { manager } = setup();

    await expect(manager.disconnect()).resolves.toBeUndefined();

    await manager.connect(ADDRESS, false, "correct-secret");
    await manager.disconnect();
    await manager.disconnect();

    expect(manager.isConnected()).toBe(false);
    expect(manager.state).toBe("disconnected");
  });

  it("should log close failures and discard the handle", async () => {
    const transport = new ControlledTransport();
    const { logger, capture } = createTestLogger();
    const manager = new ConnectionManager({ transport, logger });

    const stub = new StubConnection("conn-1", ADDRESS);
    stub.closeError = new Error("socket hang up");
    const pending = manager.connect(ADDRESS, false, "correct-secret");
    transport.last().pending.resolve(stub);
    await pending;

    await expect(manager.disconnect()).resolves.toBeUndefined();

    expect(stub.closeCalls).toBe(1);
    expect(manager.isConnected()).toBe(false);
    const entry = capture.entries.find((e) => e.message === "Error closing RPC connection");
    expect(entry?.level).toBe("ERROR");
    expect(entry?.error?.message).toBe("socket hang up");
  });

  it("should move to disconnected when the transport drops", async () => {
    const { manager, transport, capture } = setup();
    await manager.connect(ADDRESS, false, "correct-secret");

    transport.fail(new TransportError("relay went away"));

    expect(manager.state).toBe("disconnected");
    expect(manager.isConnected()).toBe(false);
    const lost = capture.entries.find((e) => e.message === "Connection lost");
    expect(lost?.level).toBe("WARN");
    expect(lost?.context?.["cause"]).toBe("relay went away");
  });

  it("should abort a pending connect on disconnect", async () => {
    const transport = new ControlledTransport();
    const { logger } = createTestLogger();
    const manager = new ConnectionManager({ transport, logger });

    const pending = manager.connect(ADDRESS, false, "correct-secret");
    const { params, pending: open } = transport.last();

    await manager.disconnect();
    expect(manager.state).toBe("disconnected");
    expect(params.signal.aborted).toBe(true);

    const late = new StubConnection("conn-late", ADDRESS);
    open.resolve(late);

    await expect(pending).rejects.toThrow("Connect to relay.example:443 was aborted");
    expect(late.closeCalls).toBe(1);
    expect(manager.isConnected()).toBe(false);
  });

  it("should notify state listeners in order", async () => {
    const { manager } = setup();
    const transitions: Array<[ConnectionState, ConnectionState]> = [];
    const unsubscribe = manager.onStateChange((state, previous) => {
      transitions.push([state, previous]);
    });

    await manager.connect(ADDRESS, false, "correct-secret");
    await manager.disconnect();
    unsubscribe();
    await manager.connect(ADDRESS, false, "correct-secret");

    expect(transitions).toEqual([
      ["connecting", "disconnected"],
      ["connected", "connecting"],
      ["disconnected", "connected"],
    ]);
  });
});
