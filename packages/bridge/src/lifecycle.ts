/**
 * @callbridge/bridge - Process Lifecycle
 * Keeps the process serving host calls until told to stop.
 */

import type { Logger } from "@callbridge/core";
import { createLogger, createDeferred } from "@callbridge/core";
import type { BridgeHost } from "./host.js";

export interface ServeOptions {
  /** Process signals that stop serving (default: SIGINT, SIGTERM) */
  signals?: readonly NodeJS.Signals[];
  /** Stops serving when aborted */
  signal?: AbortSignal;
  /** Logger */
  logger?: Logger;
}

/**
 * Why serving stopped
 */
export type StopReason = { kind: "signal"; signal: NodeJS.Signals } | { kind: "abort" };

/**
 * Serve until a process signal arrives or `options.signal` aborts, then shut
 * the host down. Resolves after teardown.
 *
 * @example
 * ```typescript
 * const host = createBridgeHost({ transport, registrations });
 * host.expose(globalThis);
 * await serve(host);
 * ```
 */
export async function serve(host: Pick<BridgeHost, "shutdown">, options: ServeOptions = {}): Promise<StopReason> {
  const logger = options.logger ?? createLogger({ name: "lifecycle" });
  const signals = options.signals ?? ["SIGINT", "SIGTERM"];
  const stopped = createDeferred<StopReason>();

  const handlers = new Map<NodeJS.Signals, () => void>();
  for (const name of signals) {
    const handler = (): void => stopped.resolve({ kind: "signal", signal: name });
    handlers.set(name, handler);
    process.once(name, handler);
  }

  const onAbort = (): void => stopped.resolve({ kind: "abort" });
  if (options.signal?.aborted) {
    onAbort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }

  // Holds the event loop open while parked
  const keepAlive = setInterval(() => undefined, 1 << 30);

  logger.info("Bridge ready");
  const reason = await stopped.promise;

  clearInterval(keepAlive);
  for (const [name, handler] of handlers) {
    process.removeListener(name, handler);
  }
  options.signal?.removeEventListener("abort", onAbort);

  logger.info("Stopping bridge", reason.kind === "signal" ? { signal: reason.signal } : {});
  await host.shutdown();
  logger.info("Bridge stopped");
  return reason;
}
