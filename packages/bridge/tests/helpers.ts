/**
 * Shared fixtures for bridge tests
 */

import { Logger, createDeferred, type Deferred, type LogEntry, type LogTransport } from "@callbridge/core";
import type { CompletionCallback, ConnectionHandle, OpenConnectionParams, Transport } from "../src/types.js";

export class CaptureTransport implements LogTransport {
  readonly name = "capture";
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

export function createTestLogger(): { logger: Logger; capture: CaptureTransport } {
  const capture = new CaptureTransport();
  const logger = new Logger({ level: "TRACE", name: "test", transports: [capture], timestamp: false });
  return { logger, capture };
}

/**
 * Records every callback invocation and resolves on the first one
 */
export function recordCallback(): {
  callback: CompletionCallback;
  calls: Array<{ result: string; error: Error | null }>;
  first: Promise<{ result: string; error: Error | null }>;
} {
  const calls: Array<{ result: string; error: Error | null }> = [];
  const deferred = createDeferred<{ result: string; error: Error | null }>();
  const callback: CompletionCallback = (result, error) => {
    calls.push({ result, error });
    deferred.resolve({ result, error });
  };
  return { callback, calls, first: deferred.promise };
}

/**
 * Hand-built connection handle; close can be made to fail
 */
export class StubConnection implements ConnectionHandle {
  readonly insecure: boolean;
  closeCalls = 0;
  closeError: Error | undefined;
  private readonly listeners = new Set<(cause?: Error) => void>();

  constructor(
    readonly id: string,
    readonly address: string,
    insecure = false
  ) {
    this.insecure = insecure;
  }

  async call(method: string, payload: string): Promise<string> {
    return JSON.stringify({ method, payload });
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.closeError) {
      throw this.closeError;
    }
  }

  onClose(listener: (cause?: Error) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  lose(cause: Error): void {
    for (const listener of Array.from(this.listeners)) {
      listener(cause);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

/**
 * Transport whose opens are settled by the test
 */
export class ControlledTransport implements Transport {
  readonly name = "controlled";
  readonly requests: Array<{ params: OpenConnectionParams; pending: Deferred<ConnectionHandle> }> = [];

  open(params: OpenConnectionParams): Promise<ConnectionHandle> {
    const pending = createDeferred<ConnectionHandle>();
    this.requests.push({ params, pending });
    return pending.promise;
  }

  last(): { params: OpenConnectionParams; pending: Deferred<ConnectionHandle> } {
    const request = this.requests[this.requests.length - 1];
    if (!request) {
      throw new Error("No open request recorded");
    }
    return request;
  }
}
