/**
 * @callbridge/bridge - Host Entry Points
 * The five operations an embedding host calls, and nothing else.
 */

import type { Logger } from "@callbridge/core";
import { createLogger } from "@callbridge/core";
import { mergeConfig } from "./config.js";
import { ConnectionManager } from "./connection.js";
import { InvocationCancelledError } from "./errors.js";
import { InvocationBridge } from "./invoke.js";
import type { MethodResolver } from "./registry.js";
import { buildRegistry } from "./registry.js";
import type { BridgeConfig, HostCallback, RegistrationUnit, Transport } from "./types.js";

/**
 * Operations exposed to the host
 */
export interface BridgeEntryPoints {
  /** Always true once the bridge exists */
  isReady(): boolean;
  /** Open the backend connection; rejects with the failure */
  connectServer(serverAddress: string, devMode: boolean, pairingSecret: string): Promise<void>;
  isConnected(): boolean;
  disconnect(): Promise<void>;
  /** Invoke a method; the callback receives the error as a message */
  invokeRPC(methodName: string, requestPayload: string, callback: HostCallback): void;
}

export interface BridgeHost extends BridgeEntryPoints {
  readonly registry: MethodResolver;
  readonly connections: ConnectionManager;
  readonly bridge: InvocationBridge;
  /**
   * Install the entry points on `target` as plain functions
   */
  expose<T extends object>(target: T): T & BridgeEntryPoints;
  /**
   * Cancel in-flight invocations and disconnect.
   * Calls made afterwards are cancelled at once.
   */
  shutdown(): Promise<void>;
}

export interface BridgeHostOptions {
  /** Transport used for connectServer */
  transport: Transport;
  /** Registration units applied in order at startup */
  registrations?: readonly RegistrationUnit[];
  /** Prebuilt registry; takes precedence over registrations */
  registry?: MethodResolver;
  /** Timeouts */
  config?: Partial<BridgeConfig>;
  /** Logger */
  logger?: Logger;
}

/**
 * Build the registry, connection manager and invocation bridge
 *
 * @example
 * ```typescript
 * const host = createBridgeHost({
 *   transport: createHttpTransport(),
 *   registrations: [lightning, router],
 * });
 *
 * await host.connectServer('relay.example:443', false, pairingSecret);
 * host.invokeRPC('lnrpc.Lightning.GetInfo', '{}', (result, error) => { ... });
 * ```
 */
export function createBridgeHost(options: BridgeHostOptions): BridgeHost {
  const logger = options.logger ?? createLogger({ name: "callbridge" });
  const config = mergeConfig(options.config);

  const registry =
    options.registry ??
    buildRegistry(options.registrations ?? [], { logger: logger.child({ component: "registry" }) });

  const connections = new ConnectionManager({
    transport: options.transport,
    config,
    logger: logger.child({ component: "connection" }),
  });

  const bridge = new InvocationBridge({
    registry,
    connections,
    config,
    logger: logger.child({ component: "invoke" }),
  });

  let closed = false;

  const entryPoints: BridgeEntryPoints = {
    isReady: () => true,

    connectServer: async (serverAddress, devMode, pairingSecret) => {
      await connections.connect(serverAddress, devMode, pairingSecret);
    },

    isConnected: () => connections.isConnected(),

    disconnect: () => connections.disconnect(),

    invokeRPC: (methodName, requestPayload, callback) => {
      if (closed) {
        callback("", new InvocationCancelledError(methodName, "bridge is shutting down").message);
        return;
      }
      bridge.invoke(methodName, requestPayload, (result, error) => {
        callback(result, error ? error.message : null);
      });
    },
  };

  return {
    ...entryPoints,
    registry,
    connections,
    bridge,

    expose<T extends object>(target: T): T & BridgeEntryPoints {
      return Object.assign(target, entryPoints);
    },

    async shutdown(): Promise<void> {
      closed = true;
      logger.info("Shutting down bridge", { inFlight: bridge.inFlight });
      await bridge.shutdown();
      await connections.disconnect();
    },
  };
}
