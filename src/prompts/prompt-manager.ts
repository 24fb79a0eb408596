import type { Message } from "../adapters/llm";
import { DEFAULT_FIRST_MESSAGE_PROMPT, DEFAULT_SYSTEM_PROMPT } from "../config";

export interface PromptManagerConfig {
  /** Base system prompt. Defaults to DEFAULT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Added to the system prompt when the user has no earlier history. */
  firstMessagePrompt?: string;
}

export interface BuildPromptArgs {
  /** Formatted history, oldest first, already including the current user message. */
  history: Message[];
  /** True when the user had no stored history before the current message. */
  isFirstMessage: boolean;
}

/**
 * PromptManager
 *
 * Centralizes how we build messages for the LLM so the system prompt and first-contact
 * behavior can evolve without touching the orchestrator.
 */
export class PromptManager {
  private readonly systemPrompt: string;
  private readonly firstMessagePrompt: string;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.firstMessagePrompt = cfg.firstMessagePrompt ?? DEFAULT_FIRST_MESSAGE_PROMPT;
  }

  buildMessages(args: BuildPromptArgs): Message[] {
    const system = args.isFirstMessage && this.firstMessagePrompt.trim()
      ? [this.systemPrompt, this.firstMessagePrompt].join("\n\n")
      : this.systemPrompt;
    return [
      { role: "system", content: system },
      ...args.history.map((m) => ({ role: m.role, content: m.content })),
    ];
  }
}
