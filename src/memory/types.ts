/**
 * Conversation history types.
 * One bounded, ordered list of message records per user, persisted through a swappable backend.
 */

export type MessageRole = "user" | "assistant" | "system";

export const MESSAGE_ROLES: readonly MessageRole[] = ["user", "assistant", "system"];

export interface MessageRecord {
  role: MessageRole;
  content: string;
  /** Epoch milliseconds; non-decreasing within one user's history. */
  timestamp: number;
}

export type BackendKind = "durable" | "volatile";

/**
 * Raw per-user persistence. Implementations store the whole list under one key;
 * trimming and ordering are the store's job, not the backend's.
 */
export interface HistoryBackend {
  readonly kind: BackendKind;
  get(userId: string): Promise<MessageRecord[]>;
  set(userId: string, records: MessageRecord[]): Promise<void>;
  delete(userId: string): Promise<void>;
  listKeys(): Promise<string[]>;
  close?(): Promise<void>;
}

export interface ConversationSummary {
  userId: string;
  count: number;
  firstTimestamp: number | null;
  lastTimestamp: number | null;
  roles: Record<MessageRole, number>;
}
