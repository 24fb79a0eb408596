/**
 * Message record construction, validation and the storage encoding used by the durable backend.
 *
 * Stored shape: {"version":1,"messages":[{"role","content","timestamp":"<ISO-8601>"}]}.
 * A bare array of records (written by older deployments) is also read.
 */

import { InvalidArgumentError } from "./errors";
import { MESSAGE_ROLES } from "./types";
import type { MessageRecord, MessageRole } from "./types";

export const STORAGE_VERSION = 1;

interface StoredRecord {
  role: MessageRole;
  content: string;
  timestamp: string;
}

interface StoredConversation {
  version: typeof STORAGE_VERSION;
  messages: StoredRecord[];
}

export interface ParsedConversation {
  records: MessageRecord[];
  /** Individual entries skipped because they were malformed. */
  dropped: number;
  /** True when the whole value was unreadable and treated as empty. */
  malformed: boolean;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return typeof value === "string" && MESSAGE_ROLES.some((role) => role === value);
}

export function assertUserId(userId: unknown): asserts userId is string {
  if (typeof userId !== "string" || userId.trim().length === 0) {
    throw new InvalidArgumentError("userId must be a non-empty string");
  }
}

export function assertRole(role: unknown): asserts role is MessageRole {
  if (!isMessageRole(role)) {
    throw new InvalidArgumentError(`Unsupported role: ${String(role)} (expected ${MESSAGE_ROLES.join(", ")})`);
  }
}

export function assertContent(content: unknown): asserts content is string {
  if (typeof content !== "string" || content.trim().length === 0) {
    throw new InvalidArgumentError("content must be a non-empty string");
  }
}

/**
 * Build a record stamped no earlier than `notBefore`, so timestamps never go backwards
 * within a user's history even if the wall clock does.
 */
export function createRecord(role: MessageRole, content: string, notBefore = 0, now: number = Date.now()): MessageRecord {
  return { role, content, timestamp: Math.max(now, notBefore) };
}

export function serializeConversation(records: MessageRecord[]): string {
  const payload: StoredConversation = {
    version: STORAGE_VERSION,
    messages: records.map((r) => ({
      role: r.role,
      content: r.content,
      timestamp: new Date(r.timestamp).toISOString(),
    })),
  };
  return JSON.stringify(payload);
}

/** Epoch ms from a stored number or ISO string; null unless it fits in a Date. */
function parseTimestamp(value: unknown): number | null {
  let ms: number;
  if (typeof value === "number") ms = value;
  else if (typeof value === "string") ms = Date.parse(value);
  else return null;
  return Number.isNaN(new Date(ms).getTime()) ? null : ms;
}

function field(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

function toRecord(entry: unknown): MessageRecord | null {
  if (!entry || typeof entry !== "object") return null;
  const role = field(entry, "role");
  const content = field(entry, "content");
  const timestamp = field(entry, "timestamp");
  if (!isMessageRole(role)) return null;
  if (typeof content !== "string" || content.trim().length === 0) return null;
  const ms = parseTimestamp(timestamp);
  if (ms === null) return null;
  return { role, content, timestamp: ms };
}

function extractEntries(parsed: unknown): unknown[] | null {
  if (Array.isArray(parsed)) return parsed;
  if (parsed && typeof parsed === "object") {
    const messages = field(parsed, "messages");
    if (Array.isArray(messages)) return messages;
  }
  return null;
}

export function parseConversation(raw: string): ParsedConversation {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { records: [], dropped: 0, malformed: true };
  }

  const entries = extractEntries(parsed);
  if (!entries) return { records: [], dropped: 0, malformed: true };

  const records: MessageRecord[] = [];
  let dropped = 0;
  for (const entry of entries) {
    const record = toRecord(entry);
    if (record) records.push(record);
    else dropped++;
  }
  return { records, dropped, malformed: false };
}
