// Single-slot history of the last completed transcription, for "repeat last".
// Written only by the orchestrator; readers never consume the entry.

import type { TranscriptionHistoryEntry } from "./types.js";

export class TranscriptionHistory {
  private entry: TranscriptionHistoryEntry | null = null;

  record(text: string, timestamp: number = Date.now()): TranscriptionHistoryEntry {
    this.entry = Object.freeze({ text, timestamp });
    return this.entry;
  }

  last(): TranscriptionHistoryEntry | null {
    return this.entry;
  }
}
