/**
 * @callbridge/bridge - Connection Lifecycle
 * Owns the single backend connection and its state transitions:
 *
 *   disconnected → connecting → connected → disconnected
 *
 * connect and disconnect are expected to be called one at a time by the host;
 * overlapping calls are still resolved deterministically through a
 * generation counter.
 */

import type { Logger } from "@callbridge/core";
import { createLogger, errorMessage, ValidationError } from "@callbridge/core";
import { checkConnectParams } from "@callbridge/types";
import { mergeConfig } from "./config.js";
import { ConnectionError } from "./errors.js";
import { executeWithTimeout, TimeoutExceededError } from "./timeout.js";
import type {
  BridgeConfig,
  ConnectionHandle,
  ConnectionState,
  OpenConnectionParams,
  Transport,
} from "./types.js";

export type ConnectionStateListener = (state: ConnectionState, previous: ConnectionState) => void;

export interface ConnectionManagerOptions {
  /** Transport used to open connections */
  transport: Transport;
  /** Timeouts; missing values come from the environment and defaults */
  config?: Partial<BridgeConfig>;
  /** Logger */
  logger?: Logger;
}

/**
 * Connection lifecycle manager
 */
export class ConnectionManager {
  private readonly transport: Transport;
  private readonly config: BridgeConfig;
  private readonly logger: Logger;
  private readonly listeners = new Set<ConnectionStateListener>();

  private handle: ConnectionHandle | undefined;
  private unsubscribeClose: (() => void) | undefined;
  private pendingConnect: AbortController | undefined;
  private generation = 0;
  private currentState: ConnectionState = "disconnected";

  constructor(options: ConnectionManagerOptions) {
    this.transport = options.transport;
    this.config = mergeConfig(options.config);
    this.logger = options.logger ?? createLogger({ name: "connection" });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /**
   * True iff a connection handle exists
   */
  isConnected(): boolean {
    return this.handle !== undefined;
  }

  /**
   * The live handle, if any
   */
  current(): ConnectionHandle | undefined {
    return this.handle;
  }

  /**
   * Subscribe to state transitions
   */
  onStateChange(listener: ConnectionStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Open the backend connection.
   * An existing connection is closed first.
   *
   * @throws ValidationError for malformed arguments
   * @throws ConnectionError when the transport fails, times out, or the attempt is aborted
   */
  async connect(serverAddress: string, insecure: boolean, secret: string): Promise<ConnectionHandle> {
    if (this.currentState === "connecting") {
      throw new ConnectionError(
        "A connect is already in progress",
        undefined,
        "CONNECT_IN_PROGRESS"
      );
    }

    const checked = checkConnectParams({ serverAddress, insecure, secret });
    if (!checked.success) {
      throw new ValidationError(
        "Invalid connect parameters",
        checked.issues.map((issue) => ({ field: issue.path, message: issue.message }))
      );
    }

    const generation = ++this.generation;
    const log = this.logger.child({ address: serverAddress });
    const previous = this.handle;

    this.setState("connecting");

    if (previous) {
      log.info("Replacing existing connection", { previous: previous.id });
      this.detach();
      await this.closeHandle(previous);
      if (generation !== this.generation) {
        throw new ConnectionError(`Connect to ${serverAddress} was aborted`);
      }
    }

    if (insecure) {
      log.warn("TLS certificate validation disabled for this connection; use only with development endpoints");
    }

    const controller = new AbortController();
    this.pendingConnect = controller;
    const startedAt = Date.now();

    const opening = this.openTransport({
      address: serverAddress,
      insecure,
      secret,
      signal: controller.signal,
    });

    let handle: ConnectionHandle;
    try {
      handle = await executeWithTimeout(
        () => opening,
        this.config.connectTimeout,
        () => controller.abort(new TimeoutExceededError(this.config.connectTimeout))
      );
    } catch (error) {
      // A transport that ignores the abort may still hand back a handle
      void opening.then(
        (late) => this.closeHandle(late),
        () => undefined
      );
      if (this.pendingConnect === controller) {
        this.pendingConnect = undefined;
      }
      if (generation === this.generation) {
        this.setState("disconnected");
      }
      log.error("Connect failed", error, { durationMs: Date.now() - startedAt });
      if (error instanceof ConnectionError) {
        throw error;
      }
      if (error instanceof TimeoutExceededError) {
        throw new ConnectionError(
          `Connect to ${serverAddress} timed out after ${this.config.connectTimeout}ms`,
          error
        );
      }
      throw new ConnectionError(
        `Unable to connect to ${serverAddress}: ${errorMessage(error)}`,
        error
      );
    }

    if (this.pendingConnect === controller) {
      this.pendingConnect = undefined;
    }

    if (generation !== this.generation) {
      // disconnect() ran while the transport was opening
      await this.closeHandle(handle);
      throw new ConnectionError(`Connect to ${serverAddress} was aborted`);
    }

    this.attach(handle);
    this.setState("connected");
    log.info("Connected", { connection: handle.id, durationMs: Date.now() - startedAt });
    return handle;
  }

  /**
   * Close the backend connection.
   * Idempotent; close failures are logged and the handle is discarded anyway.
   */
  async disconnect(): Promise<void> {
    if (this.currentState === "connecting") {
      this.generation++;
      this.pendingConnect?.abort(new ConnectionError("Connect aborted by disconnect"));
      this.pendingConnect = undefined;
      this.setState("disconnected");
      return;
    }

    const handle = this.handle;
    if (!handle) {
      return;
    }

    this.detach();
    this.setState("disconnected");
    await this.closeHandle(handle);
    this.logger.info("Disconnected", { connection: handle.id, address: handle.address });
  }

  private attach(handle: ConnectionHandle): void {
    this.handle = handle;
    this.unsubscribeClose = handle.onClose((cause) => {
      if (this.handle !== handle) return;
      this.detach();
      this.setState("disconnected");
      this.logger.warn("Connection lost", {
        connection: handle.id,
        address: handle.address,
        cause: cause ? cause.message : undefined,
      });
    });
  }

  private detach(): void {
    this.unsubscribeClose?.();
    this.unsubscribeClose = undefined;
    this.handle = undefined;
  }

  private openTransport(params: OpenConnectionParams): Promise<ConnectionHandle> {
    try {
      return this.transport.open(params);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private async closeHandle(handle: ConnectionHandle): Promise<void> {
    try {
      await executeWithTimeout(() => handle.close(), this.config.closeTimeout);
    } catch (error) {
      this.logger.error("Error closing RPC connection", error, {
        connection: handle.id,
        address: handle.address,
      });
    }
  }

  private setState(state: ConnectionState): void {
    const previous = this.currentState;
    if (previous === state) return;
    this.currentState = state;
    for (const listener of this.listeners) {
      try {
        listener(state, previous);
      } catch (error) {
        this.logger.error("Connection state listener failed", error);
      }
    }
  }
}

/**
 * Create a connection manager
 */
export function createConnectionManager(options: ConnectionManagerOptions): ConnectionManager {
  return new ConnectionManager(options);
}
