/**
 * History formatting: storage records -> what the model call and operators see.
 * Pure functions; the storage schema can change without touching the model wire format.
 */

import type { Message } from "../adapters/llm";
import type { MessageRecord, MessageRole } from "./types";

/** Role/content pairs in stored order, timestamps dropped. */
export function formatHistory(records: readonly MessageRecord[]): Message[] {
  return records.map((r) => ({ role: r.role, content: r.content }));
}

const ROLE_LABELS: Record<MessageRole, string> = {
  user: "User",
  assistant: "Assistant",
  system: "System",
};

export interface RecentContextOptions {
  /** How many of the newest messages to include (default 5). */
  maxMessages?: number;
  /** Longer contents are cut to this many characters plus "..." (default 100). */
  maxChars?: number;
}

/** One-line digest of the newest messages, e.g. for operators. */
export function describeRecentContext(records: readonly MessageRecord[], options: RecentContextOptions = {}): string {
  if (records.length === 0) return "New conversation";
  const maxMessages = options.maxMessages ?? 5;
  const maxChars = options.maxChars ?? 100;
  const parts = records.slice(-maxMessages).map((r) => {
    const content = r.content.length > maxChars ? `${r.content.slice(0, maxChars)}...` : r.content;
    return `${ROLE_LABELS[r.role]}: ${content}`;
  });
  return `Context: ${parts.join(" | ")}`;
}
