/**
 * A toy relay: pairs with one secret and answers a few Lightning-style methods.
 * Stands in for the real mailbox relay so the example runs offline.
 */

import { Hono } from "hono";
import { randomUUID } from "node:crypto";

export function createRelay(pairingSecret: string): Hono {
  const app = new Hono();
  const sessions = new Set<string>();

  app.post("/pair", async (c) => {
    const { secret } = await c.req.json<{ secret?: string }>();
    if (secret !== pairingSecret) {
      return c.json({ error: "pairing rejected" }, 401);
    }
    const sessionId = randomUUID();
    sessions.add(sessionId);
    return c.json({ sessionId });
  });

  app.post("/rpc", async (c) => {
    const session = (c.req.header("Authorization") ?? "").replace(/^Bearer /, "");
    if (!sessions.has(session)) {
      return c.json({ error: { code: "UNAUTHENTICATED", message: "unknown session" } }, 401);
    }

    const { method, payload } = await c.req.json<{ method: string; payload: string }>();
    switch (method) {
      case "lnrpc.Lightning.GetInfo":
        return c.json({ result: JSON.stringify({ version: "0.18.0-beta", alias: "example-node", num_peers: 3 }) });
      case "lnrpc.Lightning.WalletBalance":
        return c.json({ result: JSON.stringify({ total_balance: "150000", confirmed_balance: "150000" }) });
      case "lnrpc.Lightning.EchoPayload":
        return c.json({ result: payload });
      default:
        return c.json({ error: { code: "UNIMPLEMENTED", message: `unknown method ${method}` } }, 404);
    }
  });

  app.post("/close", (c) => {
    sessions.delete((c.req.header("Authorization") ?? "").replace(/^Bearer /, ""));
    return c.json({});
  });

  return app;
}
