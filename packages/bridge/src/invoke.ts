/**
 * @callbridge/bridge - Invocation Bridge
 * Resolves a method by name, runs its invoker off the caller's stack and
 * delivers exactly one outcome through the completion callback.
 */

import type { Deferred, Logger } from "@callbridge/core";
import { createDeferred, createLogger, generateId } from "@callbridge/core";
import { mergeConfig } from "./config.js";
import { createCompletion } from "./completion.js";
import {
  InternalFaultError,
  InvocationCancelledError,
  InvocationTimeoutError,
  MethodNotFoundError,
  NotConnectedError,
} from "./errors.js";
import type { MethodResolver } from "./registry.js";
import type {
  BridgeConfig,
  CallContext,
  CompletionCallback,
  ConnectionHandle,
  InvokeOptions,
  InvokerFunction,
} from "./types.js";

/**
 * Anything that can hand out the current connection
 */
export interface ConnectionSource {
  current(): ConnectionHandle | undefined;
}

export interface InvocationBridgeOptions {
  /** Sealed method registry */
  registry: MethodResolver;
  /** Source of the live connection, usually the ConnectionManager */
  connections: ConnectionSource;
  /** Timeouts; only invokeTimeout is used here */
  config?: Partial<BridgeConfig>;
  /** Logger */
  logger?: Logger;
}

interface InFlightCall {
  readonly requestId: string;
  readonly method: string;
  readonly controller: AbortController;
  readonly finished: Deferred<void>;
  /** Set once shutdown asks for cancellation, possibly before the call runs */
  cancelled: { reason: unknown } | undefined;
  onCancel: ((reason: unknown) => void) | undefined;
}

/**
 * Invocation bridge
 */
export class InvocationBridge {
  private readonly registry: MethodResolver;
  private readonly connections: ConnectionSource;
  private readonly config: BridgeConfig;
  private readonly logger: Logger;
  private readonly calls = new Set<InFlightCall>();

  constructor(options: InvocationBridgeOptions) {
    this.registry = options.registry;
    this.connections = options.connections;
    this.config = mergeConfig(options.config);
    this.logger = options.logger ?? createLogger({ name: "invoke" });
  }

  /**
   * Number of scheduled calls that have not delivered their callback yet
   */
  get inFlight(): number {
    return this.calls.size;
  }

  /**
   * Invoke a method by name.
   *
   * Returns immediately. A missing connection or unknown method is reported
   * synchronously through `callback`; everything else arrives later, once.
   */
  invoke(
    methodName: string,
    requestPayload: string,
    callback: CompletionCallback,
    options: InvokeOptions = {}
  ): void {
    const connection = this.connections.current();
    if (!connection) {
      callback("", new NotConnectedError());
      return;
    }

    const invoker = this.registry.resolve(methodName);
    if (!invoker) {
      callback("", new MethodNotFoundError(methodName));
      return;
    }

    const call: InFlightCall = {
      requestId: generateId(),
      method: methodName,
      controller: new AbortController(),
      finished: createDeferred<void>(),
      cancelled: undefined,
      onCancel: undefined,
    };
    this.calls.add(call);

    setImmediate(() => {
      void this.execute(call, invoker, connection, requestPayload, callback, options);
    });
  }

  /**
   * Promise form of {@link invoke}
   *
   * @example
   * ```typescript
   * const info = await bridge.call("lnrpc.Lightning.GetInfo", "{}");
   * ```
   */
  call(methodName: string, requestPayload: string, options: InvokeOptions = {}): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      this.invoke(
        methodName,
        requestPayload,
        (result, error) => {
          if (error) {
            reject(error);
          } else {
            resolve(result);
          }
        },
        options
      );
    });
  }

  /**
   * Wait until every in-flight call has delivered its callback
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.calls, (call) => call.finished.promise));
  }

  /**
   * Cancel every in-flight call and wait for their callbacks
   */
  async shutdown(reason?: unknown): Promise<void> {
    const pending = Array.from(this.calls);
    if (pending.length > 0) {
      this.logger.info("Cancelling in-flight calls", { count: pending.length });
    }
    for (const call of pending) {
      call.cancelled = { reason };
      call.onCancel?.(reason);
    }
    await this.drain();
  }

  private async execute(
    call: InFlightCall,
    invoker: InvokerFunction,
    connection: ConnectionHandle,
    requestPayload: string,
    callback: CompletionCallback,
    options: InvokeOptions
  ): Promise<void> {
    const { method, requestId, controller } = call;
    const log = this.logger.child({ requestId, method });

    const completion = createCompletion({
      onLateOutcome: (outcome) => {
        log.warn("Ignoring completion reported after the call settled", {
          outcome: outcome.ok ? "result" : outcome.error.code,
        });
      },
    });

    call.onCancel = (reason) => {
      completion.fail(new InvocationCancelledError(method, reason));
    };
    if (call.cancelled) {
      call.onCancel(call.cancelled.reason);
    }

    const timeoutMs = options.timeout ?? this.config.invokeTimeout;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => completion.fail(new InvocationTimeoutError(method, timeoutMs)), timeoutMs)
        : undefined;

    const external = options.signal;
    const onAbort = (): void => {
      completion.fail(new InvocationCancelledError(method, external?.reason));
    };
    if (external?.aborted) {
      onAbort();
    } else {
      external?.addEventListener("abort", onAbort, { once: true });
    }

    const startedAt = Date.now();
    if (!completion.settled) {
      const context: CallContext = { requestId, method, signal: controller.signal, logger: log };
      log.debug("Invoking", { payloadSize: requestPayload.length, connection: connection.id });

      const onFault = (error: unknown): void => {
        if (completion.settled) {
          log.error("Invoker failed after the call settled", error);
          return;
        }
        completion.fail(new InternalFaultError(method, error));
      };

      try {
        const returned = invoker(context, connection, requestPayload, completion.done);
        if (returned instanceof Promise) {
          returned.catch(onFault);
        }
      } catch (error) {
        onFault(error);
      }
    }

    const outcome = await completion.promise;

    if (timer !== undefined) {
      clearTimeout(timer);
    }
    external?.removeEventListener("abort", onAbort);

    const durationMs = Date.now() - startedAt;
    if (outcome.ok) {
      log.debug("Call completed", { durationMs });
    } else {
      log.error("Call failed", outcome.error, { durationMs });
    }

    try {
      if (outcome.ok) {
        callback(outcome.result, null);
      } else {
        callback("", outcome.error);
      }
    } catch (error) {
      log.error("Completion callback threw", error);
    }

    controller.abort();
    this.calls.delete(call);
    call.finished.resolve();
  }
}

/**
 * Create an invocation bridge
 */
export function createInvocationBridge(options: InvocationBridgeOptions): InvocationBridge {
  return new InvocationBridge(options);
}
