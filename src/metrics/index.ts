/**
 * Per-turn metrics. Latencies and history sizes are logged; the last turn is kept for health output.
 */

import { logger } from "../logging";
import type { BackendKind } from "../memory/types";

export interface TurnMetrics {
  /** "text" for typed messages, "voice" when the turn started from audio. */
  source?: "text" | "voice";
  asrLatencyMs?: number;
  llmLatencyMs?: number;
  /** Messages sent to the model, system prompt included. */
  promptMessages?: number;
  /** History length after the reply was stored. */
  historyLength?: number;
  historyBackend?: BackendKind;
  /** True when the model call failed and the fallback reply was used. */
  fallback?: boolean;
}

let lastTurnMetrics: TurnMetrics = {};

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      source: metrics.source,
      asr_latency_ms: metrics.asrLatencyMs,
      llm_latency_ms: metrics.llmLatencyMs,
      prompt_messages: metrics.promptMessages,
      history_length: metrics.historyLength,
      history_backend: metrics.historyBackend,
      fallback: metrics.fallback,
    },
    "Turn completed"
  );
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}
