/**
 * @callbridge/bridge - Core Types
 * Contracts between the host, the bridge, registration units and transports
 */

import type { Logger } from "@callbridge/core";

// ============================================================================
// CONNECTION
// ============================================================================

/**
 * Lifecycle state of the backend connection
 */
export type ConnectionState = "disconnected" | "connecting" | "connected";

/**
 * Options for a single remote call
 */
export interface RemoteCallOptions {
  /** Aborts the call; the returned promise rejects */
  signal?: AbortSignal;
}

/**
 * A live backend connection.
 * Exactly one is held by the connection manager at any time.
 */
export interface ConnectionHandle {
  /** Unique id for logging */
  readonly id: string;
  /** Address the handle is connected to */
  readonly address: string;
  /** Whether certificate checks are relaxed for this connection */
  readonly insecure: boolean;
  /**
   * Perform one remote call with an opaque serialized payload.
   * Rejects on transport failure or when the remote side reports an error.
   */
  call(method: string, payload: string, options?: RemoteCallOptions): Promise<string>;
  /** Close the connection; later calls reject */
  close(): Promise<void>;
  /**
   * Listen for the connection going away (local close or transport loss).
   * Returns an unsubscribe function.
   */
  onClose(listener: (cause?: Error) => void): () => void;
}

/**
 * Parameters passed to a transport when opening a connection
 */
export interface OpenConnectionParams {
  /** Backend address, `host:port` */
  address: string;
  /** Relax TLS certificate validation (development endpoints only) */
  insecure: boolean;
  /** Pairing secret used for the key exchange */
  secret: string;
  /** Aborted when the connect attempt times out or is superseded */
  signal: AbortSignal;
}

/**
 * Establishes backend connections
 */
export interface Transport {
  /** Transport name for identification */
  readonly name: string;
  open(params: OpenConnectionParams): Promise<ConnectionHandle>;
}

// ============================================================================
// INVOCATION
// ============================================================================

/**
 * Completion callback used inside the bridge.
 * Called with `(result, null)` on success or `("", error)` on failure.
 */
export type CompletionCallback = (result: string, error: Error | null) => void;

/**
 * Completion callback at the host boundary; errors arrive as messages.
 */
export type HostCallback = (result: string, error: string | null) => void;

/**
 * Per-invocation context handed to an invoker
 */
export interface CallContext {
  /** Request id */
  readonly requestId: string;
  /** Method name as invoked */
  readonly method: string;
  /** Aborted once the call has completed, timed out or been cancelled */
  readonly signal: AbortSignal;
  /** Logger carrying requestId and method */
  readonly logger: Logger;
}

/**
 * Performs one remote call and reports through `done` exactly once.
 */
export type InvokerFunction = (
  context: CallContext,
  connection: ConnectionHandle,
  request: string,
  done: CompletionCallback
) => void | Promise<void>;

/**
 * Options for a single invocation
 */
export interface InvokeOptions {
  /** Cancels the invocation from outside */
  signal?: AbortSignal;
  /** Timeout in ms for this call; 0 disables, default from config */
  timeout?: number;
}

// ============================================================================
// REGISTRATION
// ============================================================================

/**
 * Write side of the method registry, as seen by registration units
 */
export interface MethodRegistrar {
  register(name: string, invoker: InvokerFunction): void;
}

/**
 * A group of methods registered together at startup
 */
export interface RegistrationUnit {
  /** Unit name for logging */
  readonly name: string;
  registerInto(registry: MethodRegistrar): void;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Bridge configuration; all values in milliseconds, 0 disables
 */
export interface BridgeConfig {
  /** Default per-invocation timeout */
  invokeTimeout: number;
  /** Limit for opening a connection */
  connectTimeout: number;
  /** Limit for closing a connection before it is discarded anyway */
  closeTimeout: number;
}
