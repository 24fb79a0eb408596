/**
 * Stub ASR adapter for testing or when no provider is configured.
 * Returns a fixed transcript (empty by default).
 */

import type { IASR, TranscriptResult } from "./types";

export class StubASR implements IASR {
  constructor(private readonly transcript = "") {}

  async transcribe(_audioBuffer: Buffer, _format?: string): Promise<TranscriptResult> {
    return { text: this.transcript };
  }
}
