/**
 * @callbridge/bridge - HTTP Transport
 * Pairs with an RPC relay over HTTP(S) and forwards calls as POST requests.
 *
 *   POST /pair   { secret }            → { sessionId }
 *   POST /rpc    { method, payload }   → { result } | { error: { code, message } }
 *   POST /close
 */

import type { Logger } from "@callbridge/core";
import { createLogger, errorMessage, generateId } from "@callbridge/core";
import { parsePairingResponse, parseRpcResponse } from "@callbridge/types";
import { Agent, fetch as undiciFetch } from "undici";
import { ConnectionError, SerializationError, TransportError } from "../errors.js";
import type {
  ConnectionHandle,
  OpenConnectionParams,
  RemoteCallOptions,
  Transport,
} from "../types.js";

// ============================================================================
// FETCH CONTRACT
// ============================================================================

/**
 * Request options the transport sends
 */
export interface FetchRequestInit {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
}

/**
 * Response fields the transport reads
 */
export interface FetchResponseLike {
  readonly ok: boolean;
  readonly status: number;
  text(): Promise<string>;
}

/**
 * Minimal fetch signature; `undici.fetch`, `globalThis.fetch` and test doubles fit
 */
export type FetchLike = (url: string, init: FetchRequestInit) => Promise<FetchResponseLike>;

// ============================================================================
// HTTP TRANSPORT
// ============================================================================

/**
 * Options for creating an HTTP transport.
 */
export interface HttpTransportOptions {
  /** URL scheme (default: https) */
  scheme?: "https" | "http";
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /**
   * Fetch function (for testing or custom implementations).
   * When set, insecure mode is left to the caller's fetch.
   */
  fetch?: FetchLike;
  /** Logger */
  logger?: Logger;
}

/**
 * HTTP transport for an RPC relay.
 * In insecure mode each connection gets its own undici Agent that skips
 * certificate validation; other connections are unaffected.
 */
export class HttpTransport implements Transport {
  readonly name = "http";
  private readonly scheme: "https" | "http";
  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchLike | undefined;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions = {}) {
    this.scheme = options.scheme ?? "https";
    this.headers = options.headers ?? {};
    this.fetchFn = options.fetch;
    this.logger = options.logger ?? createLogger({ name: "http-transport" });
  }

  async open(params: OpenConnectionParams): Promise<ConnectionHandle> {
    const baseUrl = `${this.scheme}://${params.address}`;
    const agent =
      params.insecure && !this.fetchFn
        ? new Agent({ connect: { rejectUnauthorized: false } })
        : undefined;
    const fetchFn = this.fetchFn ?? createUndiciFetch(agent);

    try {
      let response: FetchResponseLike;
      try {
        response = await fetchFn(`${baseUrl}/pair`, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json",
            ...this.headers,
          },
          body: JSON.stringify({ secret: params.secret }),
          signal: params.signal,
        });
      } catch (error) {
        throw new ConnectionError(
          `Pairing request to ${params.address} failed: ${errorMessage(error)}`,
          error
        );
      }

      if (response.status === 401 || response.status === 403) {
        throw new ConnectionError(`Pairing rejected by ${params.address} (status ${response.status})`);
      }
      if (!response.ok) {
        throw new ConnectionError(`Pairing with ${params.address} failed with status ${response.status}`);
      }

      const body = await readJson(response, "pairing response");
      const pairing = parsePairingResponse(body);
      if (!pairing.success) {
        throw new ConnectionError(
          `Invalid pairing response from ${params.address}: ${pairing.issues.map((i) => `${i.path} ${i.message}`).join(", ")}`
        );
      }

      this.logger.debug("Paired with relay", { address: params.address, insecure: params.insecure });

      return new HttpConnection({
        address: params.address,
        insecure: params.insecure,
        baseUrl,
        sessionId: pairing.data.sessionId,
        headers: this.headers,
        fetch: fetchFn,
        agent,
        logger: this.logger,
      });
    } catch (error) {
      await agent?.close();
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(errorMessage(error), error);
    }
  }
}

/**
 * Create an HTTP transport.
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({ scheme: 'https' });
 * ```
 */
export function createHttpTransport(options: HttpTransportOptions = {}): HttpTransport {
  return new HttpTransport(options);
}

// ============================================================================
// CONNECTION
// ============================================================================

interface HttpConnectionOptions {
  address: string;
  insecure: boolean;
  baseUrl: string;
  sessionId: string;
  headers: Record<string, string>;
  fetch: FetchLike;
  agent: Agent | undefined;
  logger: Logger;
}

/**
 * A paired session with a relay
 */
class HttpConnection implements ConnectionHandle {
  readonly id = generateId();
  readonly address: string;
  readonly insecure: boolean;
  private readonly baseUrl: string;
  private readonly sessionId: string;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchLike;
  private readonly agent: Agent | undefined;
  private readonly logger: Logger;
  private readonly listeners = new Set<(cause?: Error) => void>();
  private closed = false;

  constructor(options: HttpConnectionOptions) {
    this.address = options.address;
    this.insecure = options.insecure;
    this.baseUrl = options.baseUrl;
    this.sessionId = options.sessionId;
    this.headers = options.headers;
    this.fetchFn = options.fetch;
    this.agent = options.agent;
    this.logger = options.logger;
  }

  async call(method: string, payload: string, options: RemoteCallOptions = {}): Promise<string> {
    if (this.closed) {
      throw new TransportError("Connection is closed", undefined, { details: { method } });
    }

    const init: FetchRequestInit = {
      method: "POST",
      headers: {
        ...this.requestHeaders(),
        "X-Method": method,
      },
      body: JSON.stringify({ method, payload }),
    };
    if (options.signal) {
      init.signal = options.signal;
    }

    let response: FetchResponseLike;
    try {
      response = await this.fetchFn(`${this.baseUrl}/rpc`, init);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportError(`Call to ${method} was aborted`, error, { retryable: false });
      }
      throw new TransportError(`HTTP request failed: ${errorMessage(error)}`, error);
    }

    if (response.status === 401) {
      const error = new TransportError("Session rejected by relay", undefined, {
        statusCode: 401,
        retryable: false,
        details: { method },
      });
      this.terminate(error);
      throw error;
    }

    let body: unknown;
    try {
      body = await readJson(response, "response");
    } catch (error) {
      if (!response.ok) {
        throw new TransportError(`Relay returned status ${response.status}`, undefined, {
          statusCode: response.status,
          details: { method },
        });
      }
      throw error;
    }

    const envelope = parseRpcResponse(body);
    if (!envelope.success) {
      if (!response.ok) {
        throw new TransportError(`Relay returned status ${response.status}`, undefined, {
          statusCode: response.status,
          details: { method },
        });
      }
      throw new SerializationError(
        `Invalid response envelope: ${envelope.issues.map((i) => `${i.path} ${i.message}`).join(", ")}`
      );
    }

    if ("error" in envelope.data) {
      const remote = envelope.data.error;
      throw new TransportError(remote.message, undefined, {
        code: remote.code,
        retryable: remote.retryable ?? false,
        details: { method },
      });
    }

    return envelope.data.result;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      const response = await this.fetchFn(`${this.baseUrl}/close`, {
        method: "POST",
        headers: this.requestHeaders(),
        body: "{}",
      });
      if (!response.ok && response.status !== 401) {
        throw new TransportError(`Relay refused close with status ${response.status}`);
      }
    } finally {
      await this.agent?.close();
      this.emitClose(undefined);
    }
  }

  onClose(listener: (cause?: Error) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private requestHeaders(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      Accept: "application/json",
      ...this.headers,
      Authorization: `Bearer ${this.sessionId}`,
    };
  }

  private terminate(cause: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.agent?.close().catch((error: unknown) => {
      this.logger.warn("Failed to release insecure agent", { error: errorMessage(error) });
    });
    this.logger.warn("Relay session ended", { address: this.address, cause: cause.message });
    this.emitClose(cause);
  }

  private emitClose(cause: Error | undefined): void {
    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener(cause);
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function createUndiciFetch(agent: Agent | undefined): FetchLike {
  if (!agent) {
    return (url, init) => undiciFetch(url, init);
  }
  return (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
}

async function readJson(response: FetchResponseLike, what: string): Promise<unknown> {
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw new TransportError(`Failed to read ${what}`, error);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new SerializationError(`Failed to deserialize ${what}`, error);
  }
}
