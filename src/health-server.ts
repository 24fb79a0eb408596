/**
 * Minimal HTTP server for liveness and history inspection, sharing the serving path's ContextStore.
 * GET /health             -> { ok, backend, lastTurn }
 * GET /chats              -> { total, chats: [{ userId, count }] }
 * GET /chats/:id          -> { userId, count, messages }
 * GET /chats/:id/summary  -> ConversationSummary
 * DELETE /chats/:id       -> { ok: true }
 */

import * as http from "http";
import { logger } from "./logging";
import type { ContextStore } from "./memory/context-store";
import { InvalidArgumentError } from "./memory/errors";
import { getLastTurnMetrics } from "./metrics";
import { errorMessage } from "./utils/errors";

const DEFAULT_PORT = 8080;

export interface HealthServerOptions {
  port?: number;
  store: ContextStore;
}

export interface RouteResult {
  status: number;
  body?: unknown;
}

const CHAT_PATH = /^\/chats\/([^/]+)(\/summary)?$/;

export async function routeRequest(store: ContextStore, method: string, rawUrl: string): Promise<RouteResult> {
  const path = rawUrl.split("?")[0];

  if (method === "GET" && (path === "/health" || path === "/")) {
    return { status: 200, body: { ok: true, backend: store.backendKind, lastTurn: getLastTurnMetrics() } };
  }

  if (method === "GET" && path === "/chats") {
    const users = await store.listUsers();
    const chats: Array<{ userId: string; count: number }> = [];
    for (const userId of users) {
      const { count } = await store.summarize(userId);
      chats.push({ userId, count });
    }
    return { status: 200, body: { total: chats.length, chats } };
  }

  const match = CHAT_PATH.exec(path);
  if (!match) return { status: 404 };

  let userId: string;
  try {
    userId = decodeURIComponent(match[1]);
  } catch {
    return { status: 400, body: { error: "Malformed user id" } };
  }
  const wantsSummary = match[2] !== undefined;

  try {
    if (method === "GET" && wantsSummary) {
      return { status: 200, body: await store.summarize(userId) };
    }
    if (method === "GET") {
      const messages = await store.read(userId);
      return {
        status: 200,
        body: {
          userId,
          count: messages.length,
          messages: messages.map((m) => ({ ...m, timestamp: new Date(m.timestamp).toISOString() })),
        },
      };
    }
    if (method === "DELETE" && !wantsSummary) {
      await store.clear(userId);
      return { status: 200, body: { ok: true } };
    }
  } catch (err) {
    if (err instanceof InvalidArgumentError) return { status: 400, body: { error: err.message } };
    throw err;
  }
  return { status: 405 };
}

export function startHealthServer(options: HealthServerOptions): http.Server {
  const port = options.port ?? DEFAULT_PORT;

  const server = http.createServer((req, res) => {
    routeRequest(options.store, req.method ?? "GET", req.url ?? "")
      .then((result) => {
        if (result.body === undefined) {
          res.writeHead(result.status);
          res.end();
          return;
        }
        res.writeHead(result.status, { "Content-Type": "application/json" });
        res.end(JSON.stringify(result.body));
      })
      .catch((err: unknown) => {
        logger.error({ event: "HTTP_ROUTE_FAILED", url: req.url, err: errorMessage(err) }, "Request failed");
        res.writeHead(500);
        res.end();
      });
  });

  server.listen(port, () => {
    logger.info({ event: "HEALTH_SERVER_STARTED", port }, "Health server listening");
  });

  return server;
}
