/**
 * @callbridge/bridge - Errors
 */

import { BridgeError, errorMessage } from "@callbridge/core";

/**
 * Base RPC error
 */
export class RpcError extends BridgeError {
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    options?: {
      retryable?: boolean;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, code, statusCode, options?.details);
    this.name = "RpcError";
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * No backend connection at invocation time
 */
export class NotConnectedError extends RpcError {
  constructor() {
    super("RPC connection not ready", "NOT_CONNECTED", 503, { retryable: true });
    this.name = "NotConnectedError";
  }
}

/**
 * Method name not present in the registry
 */
export class MethodNotFoundError extends RpcError {
  constructor(methodName: string) {
    super(`rpc with name ${methodName} not found`, "METHOD_NOT_FOUND", 404, {
      retryable: false,
      details: { method: methodName },
    });
    this.name = "MethodNotFoundError";
  }
}

/**
 * The remote call or the connection under it failed
 */
export class TransportError extends RpcError {
  constructor(
    message: string,
    cause?: unknown,
    options: { code?: string; statusCode?: number; retryable?: boolean; details?: Record<string, unknown> } = {}
  ) {
    const details: Record<string, unknown> = { ...options.details };
    if (cause !== undefined) {
      details["cause"] = errorMessage(cause);
    }
    super(message, options.code ?? "TRANSPORT_ERROR", options.statusCode ?? 502, {
      retryable: options.retryable ?? true,
      details,
    });
    this.name = "TransportError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Invocation exceeded its timeout
 */
export class InvocationTimeoutError extends TransportError {
  constructor(methodName: string, timeoutMs: number) {
    super(`Call to ${methodName} timed out after ${timeoutMs}ms`, undefined, {
      code: "TIMEOUT",
      statusCode: 504,
      retryable: true,
      details: { method: methodName, timeout: timeoutMs },
    });
    this.name = "InvocationTimeoutError";
  }
}

/**
 * Invocation was cancelled before it completed
 */
export class InvocationCancelledError extends TransportError {
  constructor(methodName: string, reason?: unknown) {
    super(`Call to ${methodName} was cancelled`, reason, {
      code: "CANCELLED",
      statusCode: 499,
      retryable: false,
      details: { method: methodName },
    });
    this.name = "InvocationCancelledError";
  }
}

/**
 * Unexpected fault inside an invoker, caught at the task boundary
 */
export class InternalFaultError extends RpcError {
  constructor(methodName: string, cause: unknown) {
    super(`Internal fault in ${methodName}: ${errorMessage(cause)}`, "INTERNAL_FAULT", 500, {
      retryable: false,
      details: {
        method: methodName,
        originalError: cause instanceof Error ? cause.name : typeof cause,
      },
    });
    this.name = "InternalFaultError";
    this.cause = cause;
  }
}

/**
 * Opening (or replacing) the backend connection failed
 */
export class ConnectionError extends RpcError {
  constructor(
    message: string,
    cause?: unknown,
    code: "CONNECTION_FAILED" | "CONNECT_IN_PROGRESS" = "CONNECTION_FAILED"
  ) {
    const details: Record<string, unknown> = {};
    if (cause !== undefined) {
      details["cause"] = errorMessage(cause);
    }
    super(message, code, code === "CONNECT_IN_PROGRESS" ? 409 : 502, {
      retryable: true,
      details,
    });
    this.name = "ConnectionError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * A method name was registered twice
 */
export class DuplicateMethodError extends RpcError {
  constructor(methodName: string, unit?: string) {
    super(`Method already registered: ${methodName}`, "DUPLICATE_METHOD", 409, {
      retryable: false,
      details: unit ? { method: methodName, unit } : { method: methodName },
    });
    this.name = "DuplicateMethodError";
  }
}

/**
 * Registration attempted after the registry was sealed
 */
export class RegistrySealedError extends RpcError {
  constructor(methodName: string) {
    super(`Registry is sealed; cannot register ${methodName}`, "REGISTRY_SEALED", 500, {
      retryable: false,
      details: { method: methodName },
    });
    this.name = "RegistrySealedError";
  }
}

/**
 * Payload could not be decoded or encoded
 */
export class SerializationError extends RpcError {
  constructor(message: string, cause?: unknown) {
    const details: Record<string, unknown> = {};
    if (cause !== undefined) {
      details["cause"] = errorMessage(cause);
    }
    super(message, "SERIALIZATION_ERROR", 400, { retryable: false, details });
    this.name = "SerializationError";
  }
}
