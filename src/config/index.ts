/**
 * Env-based configuration for the assistant.
 * Load from .env (or process.env). Do not commit secrets.
 */

import { config as loadEnv } from "dotenv";

loadEnv();

export type AsrProvider = "openai" | "stub";
export type LlmProvider = "openai" | "stub";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a friendly assistant answering WhatsApp messages. Reply briefly and in the language the user writes in.";
export const DEFAULT_FIRST_MESSAGE_PROMPT =
  "This is the first message from this user. Greet them and briefly explain how you can help.";
export const DEFAULT_FALLBACK_REPLY = "Sorry, something went wrong while preparing a reply. Please try again later.";

export interface HistoryConfig {
  /** Messages retained per user (FIFO trim on append). */
  limit: number;
  /** Durable-backend expiry after the last write. */
  ttlSeconds: number;
  /** Redis connection string; unset = in-process history only. */
  redisUrl?: string;
  /** Key prefix for per-user conversation keys. */
  keyPrefix: string;
  /** Bound on the startup connect + PING. */
  connectTimeoutMs: number;
  /** Bound on each Redis command. */
  commandTimeoutMs: number;
  /** Consecutive failed durable operations before switching to in-process history for good. */
  failureThreshold: number;
}

export interface AppConfig {
  history: HistoryConfig;

  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
  };

  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    maxTokens: number;
  };

  assistant: {
    systemPrompt: string;
    /** Appended to the system prompt when the user has no stored history. */
    firstMessagePrompt: string;
    /** Sent to the user when the model call fails. Not stored in history. */
    fallbackReply: string;
  };

  server: {
    healthPort: number;
  };
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const v = env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getPositiveInt(env: Env, key: string, defaultValue: number): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n <= 0 ? defaultValue : n;
}

function parseAsrProvider(value: string | undefined): AsrProvider {
  return value === "stub" ? "stub" : "openai";
}

function parseLlmProvider(value: string | undefined): LlmProvider {
  return value === "stub" ? "stub" : "openai";
}

/**
 * Build config from environment variables.
 * ASR_PROVIDER and LLM_PROVIDER select adapters (openai, stub); REDIS_URL enables durable history.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const openaiApiKey = getEnv(env, "OPENAI_API_KEY") || getEnv(env, "OPEN_AI_KEY");

  return {
    history: {
      limit: getPositiveInt(env, "HISTORY_LIMIT", 20),
      ttlSeconds: getPositiveInt(env, "HISTORY_TTL_SECONDS", 86_400),
      redisUrl: getEnv(env, "REDIS_URL"),
      keyPrefix: getEnv(env, "HISTORY_KEY_PREFIX") || "chat_history:",
      connectTimeoutMs: getPositiveInt(env, "REDIS_CONNECT_TIMEOUT_MS", 800),
      commandTimeoutMs: getPositiveInt(env, "REDIS_COMMAND_TIMEOUT_MS", 800),
      failureThreshold: getPositiveInt(env, "HISTORY_FAILURE_THRESHOLD", 3),
    },
    asr: {
      provider: parseAsrProvider(getEnv(env, "ASR_PROVIDER")),
      openaiApiKey,
    },
    llm: {
      provider: parseLlmProvider(getEnv(env, "LLM_PROVIDER")),
      openaiApiKey,
      openaiModel: getEnv(env, "OPENAI_MODEL") || "gpt-4o",
      maxTokens: getPositiveInt(env, "LLM_MAX_TOKENS", 500),
    },
    assistant: {
      systemPrompt: getEnv(env, "SYSTEM_PROMPT") || DEFAULT_SYSTEM_PROMPT,
      firstMessagePrompt: getEnv(env, "FIRST_MESSAGE_PROMPT") || DEFAULT_FIRST_MESSAGE_PROMPT,
      fallbackReply: getEnv(env, "FALLBACK_REPLY") || DEFAULT_FALLBACK_REPLY,
    },
    server: {
      healthPort: getPositiveInt(env, "HEALTH_PORT", 8080),
    },
  };
}
