/**
 * Basic bridge example
 *
 * This example demonstrates:
 * - Registering methods with defineService / remoteMethods
 * - Connecting through the HTTP transport (to an in-process relay)
 * - Calling methods by name through the host entry points
 * - Routing bridge logs into LogTape
 * - Serving until SIGINT/SIGTERM, then shutting down
 */

import { configure, getConsoleSink } from "@logtape/logtape";
import { createBridgeHost, defineService, remote, remoteMethods, serve } from "@callbridge/bridge";
import { createHttpTransport } from "@callbridge/bridge/transports";
import { createLogger, createLogtapeTransport, getEnv, getEnvBoolean } from "@callbridge/core";
import { createRelay } from "./relay.js";

// ============================================================================
// SETUP
// ============================================================================

await configure({
  sinks: { console: getConsoleSink() },
  loggers: [{ category: "callbridge", sinks: ["console"] }],
});

const logger = createLogger({
  name: "example",
  transports: [createLogtapeTransport({ category: ["callbridge", "example"] })],
});

const pairingSecret = getEnv("PAIRING_SECRET", "test-secret");
const relay = createRelay(pairingSecret);

const transport = createHttpTransport({
  logger: logger.child({ component: "http" }),
  fetch: async (url, init) => relay.request(url, init),
});

const lightning = defineService({
  name: "lnrpc.Lightning",
  methods: {
    GetInfo: remote(),
    WalletBalance: remote(),
    EchoPayload: remote(),
    // Answered locally, without a round trip
    Ping: (input) => ({ pong: true, input }),
  },
});

const router = remoteMethods("routerrpc.Router", ["SendPaymentV2", "TrackPaymentV2"]);

const host = createBridgeHost({
  transport,
  registrations: [lightning, router],
  logger,
});

// The embedding runtime sees these five functions and nothing else
const bridge = host.expose({});

// ============================================================================
// DEMO
// ============================================================================

function invoke(method: string, payload: string): Promise<string> {
  return new Promise((resolve) => {
    bridge.invokeRPC(method, payload, (result, error) => {
      resolve(error ? `error: ${error}` : result);
    });
  });
}

async function runDemo(): Promise<void> {
  logger.info("Bridge ready", { ready: bridge.isReady() });

  logger.info("Before connect", { result: await invoke("lnrpc.Lightning.GetInfo", "{}") });

  await bridge.connectServer("relay.example:443", false, pairingSecret);
  logger.info("Connected", { connected: bridge.isConnected() });

  for (const [method, payload] of [
    ["lnrpc.Lightning.GetInfo", "{}"],
    ["lnrpc.Lightning.WalletBalance", "{}"],
    ["lnrpc.Lightning.Ping", '{"seq":1}'],
    ["routerrpc.Router.SendPaymentV2", '{"amt":"1000"}'],
    ["lnrpc.Lightning.Bogus", "{}"],
  ] as const) {
    logger.info(method, { result: await invoke(method, payload) });
  }
}

try {
  await runDemo();
} catch (error) {
  logger.error("Demo failed", error);
}

if (getEnvBoolean("SERVE")) {
  await serve(host, { logger });
} else {
  await host.shutdown();
}
