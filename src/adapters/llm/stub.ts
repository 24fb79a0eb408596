/**
 * Stub LLM adapter for testing or when no provider is configured.
 * Returns an empty reply unless given a reply function.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export type StubReply = (messages: Message[]) => string;

export class StubLLM implements ILLM {
  /** Messages of every call, in order. */
  readonly calls: Message[][] = [];

  constructor(private readonly reply: StubReply = () => "") {}

  async chat(messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push(messages.map((m) => ({ ...m })));
    return { text: this.reply(messages) };
  }
}
