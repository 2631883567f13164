// Transcriber backed by the OpenAI audio transcriptions API.
// Privacy: audio is uploaded from memory, never written to disk.

import { File } from "node:buffer";
import type { CapturedAudio } from "./types.js";
import type { Transcriber } from "./session-orchestrator.js";
import { TranscriptionError } from "./errors.js";
import { encodeWav, audioDurationMs } from "./wav.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

// ─── OpenAI transcription client interface (for testability / dependency injection) ──

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors `audio.transcriptions.create()` with the plain "json" response format.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format?: "json";
        language?: string;
        prompt?: string;
      }): Promise<{ text: string }>;
    };
  };
}

export interface OpenAITranscriberConfig {
  model: string;
  /** ISO-639-1 code; omitted lets the model detect the language. */
  language?: string;
  prompt?: string;
}

export const DEFAULT_OPENAI_TRANSCRIBE_MODEL = "whisper-1";

export class OpenAITranscriber implements Transcriber {
  private readonly client: OpenAITranscriptionClient;
  private readonly config: OpenAITranscriberConfig;
  private readonly logger: Logger;

  constructor(
    client: OpenAITranscriptionClient,
    config: Partial<OpenAITranscriberConfig> = {},
    logger: Logger = createLogger("OpenAITranscriber"),
  ) {
    this.client = client;
    this.config = { model: DEFAULT_OPENAI_TRANSCRIBE_MODEL, ...config };
    this.logger = logger;
  }

  async transcribe(audio: CapturedAudio): Promise<string> {
    if (audio.pcm.length === 0) {
      return "";
    }

    const wav = encodeWav(audio);
    const file = new File([wav], "dictation.wav", { type: "audio/wav" });

    let response: { text: string };
    try {
      response = await this.client.audio.transcriptions.create({
        file,
        model: this.config.model,
        response_format: "json",
        ...(this.config.language ? { language: this.config.language } : {}),
        ...(this.config.prompt ? { prompt: this.config.prompt } : {}),
      });
    } catch (err) {
      throw new TranscriptionError(errorMessage(err));
    }

    const text = typeof response.text === "string" ? response.text.trim() : "";
    this.logger.info(`Transcribed ${audioDurationMs(audio)}ms of audio with ${this.config.model} (${text.length} chars)`);
    return text;
  }
}
