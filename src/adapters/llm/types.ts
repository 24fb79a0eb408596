/**
 * LLM adapter types. Implementations are swapped via config (OpenAI, stub).
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
}

export interface ChatResponse {
  text: string;
}

export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
