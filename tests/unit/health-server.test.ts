/**
 * Unit tests for the health/history HTTP routes (no socket is opened).
 */

import { routeRequest } from "../../src/health-server";
import { VolatileHistoryBackend } from "../../src/memory/backends/volatile";
import { ContextStore } from "../../src/memory/context-store";
import { recordTurnMetrics } from "../../src/metrics";

async function seededStore(): Promise<ContextStore> {
  const volatile = new VolatileHistoryBackend();
  await volatile.set("+15550100", [
    { role: "user", content: "hello", timestamp: 0 },
    { role: "assistant", content: "hi there", timestamp: 1000 },
  ]);
  await volatile.set("u2", [{ role: "user", content: "prices?", timestamp: 2000 }]);
  return new ContextStore({ limit: 20, volatile });
}

describe("routeRequest", () => {
  it("reports health and the active backend", async () => {
    const store = await seededStore();
    const healthy = { status: 200, body: { ok: true, backend: "volatile", lastTurn: {} } };
    expect(await routeRequest(store, "GET", "/health")).toEqual(healthy);
    expect(await routeRequest(store, "GET", "/?verbose=1")).toEqual(healthy);
  });

  it("includes the metrics of the last turn", async () => {
    const store = await seededStore();
    recordTurnMetrics({ source: "voice", llmLatencyMs: 120, historyLength: 4, historyBackend: "volatile", fallback: false });
    expect(await routeRequest(store, "GET", "/health")).toEqual({
      status: 200,
      body: {
        ok: true,
        backend: "volatile",
        lastTurn: { source: "voice", llmLatencyMs: 120, historyLength: 4, historyBackend: "volatile", fallback: false },
      },
    });
  });

  it("lists chats", async () => {
    const store = await seededStore();
    expect(await routeRequest(store, "GET", "/chats")).toEqual({
      status: 200,
      body: { total: 2, chats: [{ userId: "+15550100", count: 2 }, { userId: "u2", count: 1 }] },
    });
  });

  it("returns one chat with ISO timestamps, decoding the id", async () => {
    const store = await seededStore();
    expect(await routeRequest(store, "GET", "/chats/%2B15550100")).toEqual({
      status: 200,
      body: {
        userId: "+15550100",
        count: 2,
        messages: [
          { role: "user", content: "hello", timestamp: "1970-01-01T00:00:00.000Z" },
          { role: "assistant", content: "hi there", timestamp: "1970-01-01T00:00:01.000Z" },
        ],
      },
    });
  });

  it("returns a chat summary", async () => {
    const store = await seededStore();
    expect(await routeRequest(store, "GET", "/chats/u2/summary")).toEqual({
      status: 200,
      body: {
        userId: "u2",
        count: 1,
        firstTimestamp: 2000,
        lastTimestamp: 2000,
        roles: { user: 1, assistant: 0, system: 0 },
      },
    });
  });

  it("deletes a chat", async () => {
    const store = await seededStore();
    expect(await routeRequest(store, "DELETE", "/chats/u2")).toEqual({ status: 200, body: { ok: true } });
    expect(await store.read("u2")).toEqual([]);
  });

  it("rejects unknown paths, methods and bad ids", async () => {
    const store = await seededStore();
    expect(await routeRequest(store, "GET", "/nope")).toEqual({ status: 404 });
    expect(await routeRequest(store, "POST", "/chats/u2")).toEqual({ status: 405 });
    expect(await routeRequest(store, "DELETE", "/chats/u2/summary")).toEqual({ status: 405 });
    expect(await routeRequest(store, "GET", "/chats/%E0%A4%A")).toEqual({ status: 400, body: { error: "Malformed user id" } });
    expect(await routeRequest(store, "GET", "/chats/%20")).toEqual({
      status: 400,
      body: { error: "userId must be a non-empty string" },
    });
  });
});
