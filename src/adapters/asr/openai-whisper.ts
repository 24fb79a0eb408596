/**
 * OpenAI Whisper API ASR adapter.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import OpenAI from "openai";
import { logger } from "../../logging";
import { errorMessage } from "../../utils/errors";
import type { IASR, TranscriptResult } from "./types";

/** Containers the transcription endpoint accepts; anything else is sent as ogg. */
const SUPPORTED_FORMATS = ["ogg", "mp3", "mp4", "m4a", "wav", "webm", "mpeg", "mpga", "flac"];

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
}

export function whisperFileExtension(format: string | undefined): string {
  const f = (format ?? "").trim().toLowerCase().replace(/^\./, "");
  if (f === "oga" || f === "opus") return "ogg";
  return SUPPORTED_FORMATS.includes(f) ? f : "ogg";
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async transcribe(audioBuffer: Buffer, format: string = "ogg"): Promise<TranscriptResult> {
    const ext = whisperFileExtension(format);
    const tmpPath = path.join(os.tmpdir(), `whisper-${Date.now()}-${Math.random().toString(16).slice(2)}.${ext}`);
    try {
      fs.writeFileSync(tmpPath, audioBuffer);
      const transcription = await this.client.audio.transcriptions.create({
        file: fs.createReadStream(tmpPath),
        model: this.config.model ?? "whisper-1",
        response_format: "verbose_json",
      });
      // verbose_json adds language; older SDK typings only declare text.
      const language: unknown = Reflect.get(transcription, "language");
      return {
        text: transcription.text ?? "",
        language: typeof language === "string" ? language : undefined,
      };
    } finally {
      try {
        fs.unlinkSync(tmpPath);
      } catch (err) {
        logger.debug({ event: "ASR_TMP_CLEANUP_FAILED", path: tmpPath, err: errorMessage(err) }, "Could not remove temp audio file");
      }
    }
  }
}
