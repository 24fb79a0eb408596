/**
 * Unit tests for history admin commands and CLI argument parsing.
 */

import { runHistoryCommand } from "../../../src/admin/commands";
import { parseHistoryArgs } from "../../../src/cli/history";
import { VolatileHistoryBackend } from "../../../src/memory/backends/volatile";
import { ContextStore } from "../../../src/memory/context-store";

async function seededStore(): Promise<ContextStore> {
  const volatile = new VolatileHistoryBackend();
  await volatile.set("u1", [
    { role: "user", content: "hello", timestamp: 0 },
    { role: "assistant", content: "hi there", timestamp: 1000 },
  ]);
  await volatile.set("u2", [{ role: "user", content: "prices?", timestamp: 2000 }]);
  return new ContextStore({ limit: 20, volatile });
}

describe("runHistoryCommand", () => {
  it("lists chats with message counts", async () => {
    const store = await seededStore();
    expect(await runHistoryCommand(store, { action: "list" })).toEqual([
      "Active chats (2):",
      "u1: 2 messages",
      "u2: 1 messages",
    ]);
  });

  it("reports no chats on an empty store", async () => {
    const store = new ContextStore({ limit: 20 });
    expect(await runHistoryCommand(store, { action: "list" })).toEqual(["No active chats"]);
  });

  it("shows a conversation oldest first", async () => {
    const store = await seededStore();
    expect(await runHistoryCommand(store, { action: "show", userId: "u1" })).toEqual([
      "History for u1:",
      "1. User (1970-01-01T00:00:00.000Z)",
      "   hello",
      "2. Bot (1970-01-01T00:00:01.000Z)",
      "   hi there",
    ]);
  });

  it("shows an empty history", async () => {
    const store = await seededStore();
    expect(await runHistoryCommand(store, { action: "show", userId: "nobody" })).toEqual([
      "History for nobody:",
      "History is empty",
    ]);
  });

  it("summarizes a conversation", async () => {
    const store = await seededStore();
    expect(await runHistoryCommand(store, { action: "summary", userId: "u1" })).toEqual([
      "Summary for u1:",
      "Messages: 2",
      "Roles: user=1, assistant=1, system=0",
      "First: 1970-01-01T00:00:00.000Z",
      "Last: 1970-01-01T00:00:01.000Z",
      "Context: User: hello | Assistant: hi there",
    ]);
  });

  it("summarizes an unknown user", async () => {
    const store = await seededStore();
    expect(await runHistoryCommand(store, { action: "summary", userId: "nobody" })).toEqual([
      "Summary for nobody:",
      "Messages: 0",
      "Roles: user=0, assistant=0, system=0",
      "First: -",
      "Last: -",
      "New conversation",
    ]);
  });

  it("clears one chat and leaves the others", async () => {
    const store = await seededStore();
    expect(await runHistoryCommand(store, { action: "clear", userId: "u1" })).toEqual(["Cleared history for u1"]);
    expect(await store.listUsers()).toEqual(["u2"]);
  });

  it("clears all chats", async () => {
    const store = await seededStore();
    expect(await runHistoryCommand(store, { action: "clear-all" })).toEqual(["Cleared 2 chats"]);
    expect(await runHistoryCommand(store, { action: "list" })).toEqual(["No active chats"]);
  });
});

describe("parseHistoryArgs", () => {
  it("requires an action", () => {
    expect(parseHistoryArgs([])).toEqual({ ok: false, error: "Missing action" });
  });

  it("rejects unknown actions", () => {
    expect(parseHistoryArgs(["drop"])).toEqual({ ok: false, error: "Unknown action: drop" });
  });

  it("requires --phone for per-user actions", () => {
    expect(parseHistoryArgs(["show"])).toEqual({ ok: false, error: 'Action "show" needs --phone <id>' });
    expect(parseHistoryArgs(["clear", "--phone", "  "])).toEqual({ ok: false, error: 'Action "clear" needs --phone <id>' });
  });

  it("parses per-user actions with either flag spelling", () => {
    expect(parseHistoryArgs(["show", "--phone", "+15550100"])).toEqual({
      ok: true,
      command: { action: "show", userId: "+15550100" },
      yes: false,
    });
    expect(parseHistoryArgs(["summary", "-p", " u1 "])).toEqual({
      ok: true,
      command: { action: "summary", userId: "u1" },
      yes: false,
    });
  });

  it("parses clear-all with confirmation skipped", () => {
    expect(parseHistoryArgs(["clear-all", "-y"])).toEqual({ ok: true, command: { action: "clear-all" }, yes: true });
    expect(parseHistoryArgs(["--yes", "clear-all"])).toEqual({ ok: true, command: { action: "clear-all" }, yes: true });
  });

  it("rejects extra positional arguments", () => {
    expect(parseHistoryArgs(["list", "extra"])).toEqual({ ok: false, error: "Unexpected argument: extra" });
  });
});
