/**
 * @callbridge/bridge - One-shot completion
 * The first outcome wins; later ones are reported and dropped.
 */

import { createDeferred, errorMessage } from "@callbridge/core";
import { RpcError, TransportError } from "./errors.js";
import type { CompletionCallback } from "./types.js";

/**
 * Outcome of one invocation
 */
export type InvocationOutcome =
  | { ok: true; result: string }
  | { ok: false; error: RpcError };

export interface Completion {
  /** Resolves with the first outcome; never rejects */
  readonly promise: Promise<InvocationOutcome>;
  /** Whether an outcome has been recorded */
  readonly settled: boolean;
  /**
   * Callback handed to invokers.
   * Errors that are not RpcErrors are wrapped as TransportError.
   */
  readonly done: CompletionCallback;
  /**
   * Record a failure produced by the bridge itself.
   * Returns false if an outcome was already recorded.
   */
  fail(error: RpcError): boolean;
}

export interface CompletionOptions {
  /** Called with every outcome that arrives after the first */
  onLateOutcome?: (outcome: InvocationOutcome) => void;
}

/**
 * Create a one-shot completion.
 *
 * @example
 * ```typescript
 * const completion = createCompletion();
 * invoker(context, connection, request, completion.done);
 * const outcome = await completion.promise;
 * ```
 */
export function createCompletion(options: CompletionOptions = {}): Completion {
  const deferred = createDeferred<InvocationOutcome>();
  let settled = false;

  const settle = (outcome: InvocationOutcome): boolean => {
    if (settled) {
      options.onLateOutcome?.(outcome);
      return false;
    }
    settled = true;
    deferred.resolve(outcome);
    return true;
  };

  const done: CompletionCallback = (result, error) => {
    if (error) {
      const rpcError =
        error instanceof RpcError ? error : new TransportError(errorMessage(error), error);
      settle({ ok: false, error: rpcError });
    } else {
      settle({ ok: true, result });
    }
  };

  return {
    promise: deferred.promise,
    get settled() {
      return settled;
    },
    done,
    fail: (error) => settle({ ok: false, error }),
  };
}
