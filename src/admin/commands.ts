/**
 * Operator commands over a ContextStore: list, show, clear, clear-all, summary.
 * Used by the history-admin CLI; output is plain lines.
 */

import type { ContextStore } from "../memory/context-store";
import type { MessageRole } from "../memory/types";

export const HISTORY_ACTIONS = ["list", "show", "clear", "clear-all", "summary"] as const;

export type HistoryAction = (typeof HISTORY_ACTIONS)[number];

export type HistoryCommand =
  | { action: "list" }
  | { action: "clear-all" }
  | { action: "show" | "clear" | "summary"; userId: string };

const ROLE_LABELS: Record<MessageRole, string> = {
  user: "User",
  assistant: "Bot",
  system: "System",
};

export function isHistoryAction(value: string): value is HistoryAction {
  return HISTORY_ACTIONS.some((a) => a === value);
}

function formatTime(ms: number | null): string {
  return ms === null ? "-" : new Date(ms).toISOString();
}

export async function runHistoryCommand(store: ContextStore, command: HistoryCommand): Promise<string[]> {
  switch (command.action) {
    case "list": {
      const users = await store.listUsers();
      if (users.length === 0) return ["No active chats"];
      const lines = [`Active chats (${users.length}):`];
      for (const userId of users) {
        const { count } = await store.summarize(userId);
        lines.push(`${userId}: ${count} messages`);
      }
      return lines;
    }
    case "show": {
      const records = await store.read(command.userId);
      const lines = [`History for ${command.userId}:`];
      if (records.length === 0) return [...lines, "History is empty"];
      records.forEach((r, i) => {
        lines.push(`${i + 1}. ${ROLE_LABELS[r.role]} (${formatTime(r.timestamp)})`);
        lines.push(`   ${r.content}`);
      });
      return lines;
    }
    case "clear":
      await store.clear(command.userId);
      return [`Cleared history for ${command.userId}`];
    case "clear-all": {
      const removed = await store.clearAll();
      return [`Cleared ${removed} chats`];
    }
    case "summary": {
      const summary = await store.summarize(command.userId);
      const context = await store.describeContext(command.userId);
      return [
        `Summary for ${command.userId}:`,
        `Messages: ${summary.count}`,
        `Roles: user=${summary.roles.user}, assistant=${summary.roles.assistant}, system=${summary.roles.system}`,
        `First: ${formatTime(summary.firstTimestamp)}`,
        `Last: ${formatTime(summary.lastTimestamp)}`,
        context,
      ];
    }
  }
}
