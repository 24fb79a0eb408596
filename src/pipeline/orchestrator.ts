/**
 * Orchestrator: coordinates ASR -> history -> LLM -> history for one inbound message.
 * The transport (webhook, console) hands it text or audio and sends back whatever it returns.
 */

import type { IASR } from "../adapters/asr";
import type { ILLM, Message } from "../adapters/llm";
import { DEFAULT_FALLBACK_REPLY } from "../config";
import { logAsrResult, logLlmCall, logger } from "../logging";
import type { ContextStore } from "../memory/context-store";
import { formatHistory } from "../memory/formatter";
import { recordTurnMetrics } from "../metrics";
import { PromptManager } from "../prompts/prompt-manager";
import { errorMessage } from "../utils/errors";
import { withTimeout } from "../utils/timeout";

const DEFAULT_ASR_TIMEOUT_MS = 20_000;
const DEFAULT_LLM_TIMEOUT_MS = 25_000;

export interface OrchestratorConfig {
  /** Prompt builder; defaults to PromptManager with DEFAULT_SYSTEM_PROMPT. */
  promptManager?: PromptManager;
  /** Reply sent when the model call fails. Never stored in history. */
  fallbackReply?: string;
  maxTokens?: number;
  /** Timeouts for external calls. */
  timeouts?: { asrMs?: number; llmMs?: number };
}

export interface PipelineCallbacks {
  onUserTranscript?(userId: string, text: string): void;
  onAgentReply?(userId: string, text: string): void;
}

interface TurnInput {
  source: "text" | "voice";
  asrLatencyMs?: number;
}

export class Orchestrator {
  private readonly promptManager: PromptManager;
  private readonly fallbackReply: string;
  private readonly maxTokens: number;
  private readonly timeouts: { asrMs: number; llmMs: number };

  constructor(
    private readonly asr: IASR,
    private readonly llm: ILLM,
    private readonly store: ContextStore,
    config: OrchestratorConfig = {},
    private readonly callbacks: PipelineCallbacks = {}
  ) {
    this.promptManager = config.promptManager ?? new PromptManager();
    this.fallbackReply = config.fallbackReply ?? DEFAULT_FALLBACK_REPLY;
    this.maxTokens = config.maxTokens ?? 500;
    this.timeouts = {
      asrMs: config.timeouts?.asrMs ?? DEFAULT_ASR_TIMEOUT_MS,
      llmMs: config.timeouts?.llmMs ?? DEFAULT_LLM_TIMEOUT_MS,
    };
  }

  /** Handle a typed message. Resolves with the reply to send, or null when there is nothing to answer. */
  async handleText(userId: string, text: string): Promise<string | null> {
    const trimmed = text.trim();
    if (!trimmed) return null;
    return this.runTurn(userId, trimmed, { source: "text" });
  }

  /**
   * Handle a voice note: transcribe, then answer like text.
   * A failed transcription gets the fallback reply; an empty one gets no reply.
   */
  async handleVoice(userId: string, audio: Buffer, format = "ogg"): Promise<string | null> {
    const asrStart = Date.now();
    let transcript: string;
    try {
      const result = await withTimeout(this.asr.transcribe(audio, format), this.timeouts.asrMs, "ASR");
      transcript = (result.text || "").trim();
    } catch (err) {
      logger.warn({ event: "ASR_FAILED", userId, err: errorMessage(err) }, "ASR failed");
      return this.fallbackReply;
    }
    const asrLatencyMs = Date.now() - asrStart;
    logAsrResult(logger, transcript.length, asrLatencyMs);
    if (!transcript) return null;
    return this.runTurn(userId, transcript, { source: "voice", asrLatencyMs });
  }

  private async runTurn(userId: string, text: string, input: TurnInput): Promise<string> {
    this.callbacks.onUserTranscript?.(userId, text);

    const appended = await this.store.appendWithHistory(userId, "user", text);
    const history = formatHistory(appended.history);
    const messages: Message[] = this.promptManager.buildMessages({ history, isFirstMessage: appended.wasEmpty });

    const llmStart = Date.now();
    let reply = "";
    try {
      const llmResponse = await withTimeout(this.llm.chat(messages, { maxTokens: this.maxTokens }), this.timeouts.llmMs, "LLM");
      reply = llmResponse.text;
    } catch (err) {
      logger.warn({ event: "LLM_FAILED", userId, err: errorMessage(err) }, "LLM failed");
    }
    const llmLatencyMs = Date.now() - llmStart;
    reply = reply.trim();
    const fallback = reply.length === 0;

    let historyLength = history.length;
    if (fallback) {
      reply = this.fallbackReply;
    } else {
      logLlmCall(logger, messages.length, reply.length, llmLatencyMs);
      await this.store.append(userId, "assistant", reply);
      historyLength = Math.min(history.length + 1, this.store.limit);
    }
    this.callbacks.onAgentReply?.(userId, reply);

    recordTurnMetrics({
      source: input.source,
      asrLatencyMs: input.asrLatencyMs,
      llmLatencyMs,
      promptMessages: messages.length,
      historyLength,
      historyBackend: this.store.backendKind,
      fallback,
    });
    return reply;
  }
}
