/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (OpenAI Whisper, stub).
 */

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Optional language code. */
  language?: string;
}

/**
 * ASR adapter interface: audio buffer in, transcript out.
 */
export interface IASR {
  /**
   * Transcribe audio to text.
   * @param audioBuffer - Encoded audio as downloaded (WhatsApp voice notes are OGG/Opus).
   * @param format - Container hint (e.g. "ogg", "mp3", "wav"). Provider-dependent.
   */
  transcribe(audioBuffer: Buffer, format?: string): Promise<TranscriptResult>;
}
