/**
 * @callbridge/bridge - Memory Transport
 * In-process transport backed by a method table.
 * Used by tests and by hosts that embed the backend in the same process.
 */

import { errorMessage, generateId, sleep } from "@callbridge/core";
import { ConnectionError, RpcError, TransportError } from "../errors.js";
import type {
  ConnectionHandle,
  OpenConnectionParams,
  RemoteCallOptions,
  Transport,
} from "../types.js";

/**
 * Backend implementation of one remote method
 */
export type MemoryMethod = (
  payload: string,
  options: RemoteCallOptions
) => string | Promise<string>;

export interface MemoryTransportOptions {
  /** Pairing secret the backend accepts */
  secret: string;
  /** Remote methods by name */
  methods?: Record<string, MemoryMethod>;
  /** Delay before open completes, in ms */
  openDelay?: number;
}

/**
 * Memory transport
 */
export class MemoryTransport implements Transport {
  readonly name = "memory";
  private readonly secret: string;
  private readonly methods = new Map<string, MemoryMethod>();
  private readonly openDelay: number;
  private readonly connections = new Set<MemoryConnection>();
  private opens = 0;

  constructor(options: MemoryTransportOptions) {
    this.secret = options.secret;
    this.openDelay = options.openDelay ?? 0;
    for (const [name, method] of Object.entries(options.methods ?? {})) {
      this.methods.set(name, method);
    }
  }

  /**
   * Add or replace a remote method
   */
  define(name: string, method: MemoryMethod): this {
    this.methods.set(name, method);
    return this;
  }

  /**
   * Connections opened and not yet closed
   */
  get openConnections(): number {
    return this.connections.size;
  }

  /**
   * Successful opens so far
   */
  get openCount(): number {
    return this.opens;
  }

  async open(params: OpenConnectionParams): Promise<ConnectionHandle> {
    if (this.openDelay > 0) {
      await sleep(this.openDelay);
    }
    if (params.signal.aborted) {
      throw new ConnectionError(`Connect to ${params.address} was aborted`, params.signal.reason);
    }
    if (params.secret !== this.secret) {
      throw new ConnectionError(`Pairing rejected by ${params.address}: invalid secret`);
    }

    const connection = new MemoryConnection(params.address, params.insecure, this.methods, (closed) => {
      this.connections.delete(closed);
    });
    this.connections.add(connection);
    this.opens++;
    return connection;
  }

  /**
   * Drop every open connection as if the link went away
   */
  fail(cause: Error = new TransportError("Transport lost")): void {
    for (const connection of Array.from(this.connections)) {
      connection.terminate(cause);
    }
  }
}

class MemoryConnection implements ConnectionHandle {
  readonly id = generateId();
  private readonly listeners = new Set<(cause?: Error) => void>();
  private closed = false;

  constructor(
    readonly address: string,
    readonly insecure: boolean,
    private readonly methods: ReadonlyMap<string, MemoryMethod>,
    private readonly onRelease: (connection: MemoryConnection) => void
  ) {}

  async call(method: string, payload: string, options: RemoteCallOptions = {}): Promise<string> {
    if (this.closed) {
      throw new TransportError("Connection is closed", undefined, { details: { method } });
    }

    const implementation = this.methods.get(method);
    if (!implementation) {
      throw new TransportError(`Unknown remote method ${method}`, undefined, {
        code: "UNIMPLEMENTED",
        retryable: false,
        details: { method },
      });
    }

    let result: string;
    try {
      result = await implementation(payload, options);
    } catch (error) {
      if (error instanceof RpcError) {
        throw error;
      }
      throw new TransportError(errorMessage(error), error, { details: { method } });
    }

    if (this.closed) {
      throw new TransportError("Connection closed during call", undefined, { details: { method } });
    }
    return result;
  }

  async close(): Promise<void> {
    this.terminate(undefined);
  }

  onClose(listener: (cause?: Error) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  terminate(cause: Error | undefined): void {
    if (this.closed) return;
    this.closed = true;
    this.onRelease(this);
    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener(cause);
    }
  }
}

/**
 * Create a memory transport
 */
export function createMemoryTransport(options: MemoryTransportOptions): MemoryTransport {
  return new MemoryTransport(options);
}
