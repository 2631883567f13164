// Hallucination filter for ASR output.
// Speech recognizers fed silence or noise tend to emit stock phrases and
// bracketed annotations. These are stripped before the text is typed.

import type { TextFilter } from "./session-orchestrator.js";

export const DEFAULT_HALLUCINATION_PHRASES: readonly string[] = [
  "Thanks for watching!",
  "Thank you for watching!",
  "Thanks for watching.",
  "Thank you for watching.",
  "Please subscribe to the channel.",
  "Subtitles by the Amara.org community",
  "Like and subscribe!",
];

// [BLANK_AUDIO], [Music], (silence), (applause) ...
const ANNOTATION_PATTERN = /\[[^\]]*\]|\((?:silence|music|applause|laughter|noise|inaudible)\)/gi;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export class HallucinationFilter implements TextFilter {
  private readonly phrasePatterns: RegExp[];

  constructor(extraPhrases: readonly string[] = []) {
    const phrases = [...DEFAULT_HALLUCINATION_PHRASES, ...extraPhrases]
      .map(collapseWhitespace)
      .filter((phrase) => phrase.length > 0)
      // Longest first so "Thank you for watching!" wins over a shorter prefix
      .sort((a, b) => b.length - a.length);
    this.phrasePatterns = phrases.map((phrase) => new RegExp(escapeRegExp(phrase), "gi"));
  }

  apply(text: string): string {
    let result = text.replace(ANNOTATION_PATTERN, " ");
    for (const pattern of this.phrasePatterns) {
      result = result.replace(pattern, " ");
    }
    return collapseWhitespace(result);
  }
}
