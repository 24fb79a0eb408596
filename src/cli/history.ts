/**
 * history-admin: inspect and clear stored conversation history.
 *
 *   history-admin list
 *   history-admin show --phone <id>
 *   history-admin clear --phone <id>
 *   history-admin clear-all [--yes]
 *   history-admin summary --phone <id>
 *
 * Connects to the same Redis (REDIS_URL) as the running service, so changes are visible to it at once.
 */

import { createInterface } from "node:readline/promises";
import { HISTORY_ACTIONS, isHistoryAction, runHistoryCommand } from "../admin/commands";
import type { HistoryCommand } from "../admin/commands";
import { loadConfig } from "../config";
import { logError, logger } from "../logging";
import { ContextStore } from "../memory/context-store";

export const USAGE = `Usage: history-admin <${HISTORY_ACTIONS.join("|")}> [--phone <id>] [--yes]`;

export type ParsedArgs = { ok: true; command: HistoryCommand; yes: boolean } | { ok: false; error: string };

export function parseHistoryArgs(argv: string[]): ParsedArgs {
  let action: string | undefined;
  let phone: string | undefined;
  let yes = false;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--phone" || a === "-p") phone = argv[++i];
    else if (a === "--yes" || a === "-y") yes = true;
    else if (!action) action = a;
    else return { ok: false, error: `Unexpected argument: ${a}` };
  }

  if (!action) return { ok: false, error: "Missing action" };
  if (!isHistoryAction(action)) return { ok: false, error: `Unknown action: ${action}` };
  if (action === "list" || action === "clear-all") return { ok: true, command: { action }, yes };

  const userId = phone?.trim();
  if (!userId) return { ok: false, error: `Action "${action}" needs --phone <id>` };
  return { ok: true, command: { action, userId }, yes };
}

async function confirmClearAll(): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question("Clear ALL chats? (y/N): ");
    return answer.trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseHistoryArgs(argv);
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    return 1;
  }

  if (parsed.command.action === "clear-all" && !parsed.yes && !(await confirmClearAll())) {
    console.log("Cancelled");
    return 0;
  }

  const config = loadConfig();
  const store = await ContextStore.create(config.history);
  if (store.backendKind === "volatile") {
    console.error("Note: no Redis connection; only this process's (empty) history is visible. Set REDIS_URL.");
  }
  try {
    const lines = await runHistoryCommand(store, parsed.command);
    for (const line of lines) console.log(line);
  } finally {
    await store.close();
  }
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      logError(logger, err instanceof Error ? err : new Error(String(err)));
      process.exit(1);
    }
  );
}
