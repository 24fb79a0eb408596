/**
 * In-process history backend: a plain map owned by whoever constructs it.
 * No expiry; contents live until cleared or the process exits.
 */

import type { HistoryBackend, MessageRecord } from "../types";

function copy(records: MessageRecord[]): MessageRecord[] {
  return records.map((r) => ({ ...r }));
}

export class VolatileHistoryBackend implements HistoryBackend {
  readonly kind = "volatile" as const;
  private readonly conversations = new Map<string, MessageRecord[]>();

  async get(userId: string): Promise<MessageRecord[]> {
    const records = this.conversations.get(userId);
    return records ? copy(records) : [];
  }

  async set(userId: string, records: MessageRecord[]): Promise<void> {
    this.conversations.set(userId, copy(records));
  }

  async delete(userId: string): Promise<void> {
    this.conversations.delete(userId);
  }

  async listKeys(): Promise<string[]> {
    return [...this.conversations.keys()];
  }

  /** Drop every conversation; returns how many there were. */
  clearAll(): number {
    const n = this.conversations.size;
    this.conversations.clear();
    return n;
  }

  get size(): number {
    return this.conversations.size;
  }
}
