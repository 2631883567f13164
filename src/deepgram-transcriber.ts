// Transcriber backed by Deepgram's prerecorded (batch) API.

import type { CapturedAudio } from "./types.js";
import type { Transcriber } from "./session-orchestrator.js";
import { TranscriptionError } from "./errors.js";
import { encodeWav, audioDurationMs } from "./wav.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

/**
 * Subset of a Deepgram prerecorded response we read.
 * Matches the SyncPrerecordedResponse type from @deepgram/sdk.
 */
export interface DeepgramPrerecordedResult {
  results?: {
    channels?: Array<{
      alternatives?: Array<{ transcript?: string; confidence?: number }>;
    }>;
  };
}

/** Minimal interface for `deepgram.listen.prerecorded` (DeepgramClient satisfies it). */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: { model: string; smart_format?: boolean; language?: string; mimetype?: string },
      ): Promise<{ result: DeepgramPrerecordedResult | null; error: { message: string } | null }>;
    };
  };
}

export interface DeepgramTranscriberConfig {
  model: string;
  language?: string;
}

export const DEFAULT_DEEPGRAM_MODEL = "nova-2";

export class DeepgramTranscriber implements Transcriber {
  private readonly client: DeepgramPrerecordedClient;
  private readonly config: DeepgramTranscriberConfig;
  private readonly logger: Logger;

  constructor(
    client: DeepgramPrerecordedClient,
    config: Partial<DeepgramTranscriberConfig> = {},
    logger: Logger = createLogger("DeepgramTranscriber"),
  ) {
    this.client = client;
    this.config = { model: DEFAULT_DEEPGRAM_MODEL, ...config };
    this.logger = logger;
  }

  async transcribe(audio: CapturedAudio): Promise<string> {
    if (audio.pcm.length === 0) {
      return "";
    }

    let response: Awaited<ReturnType<DeepgramPrerecordedClient["listen"]["prerecorded"]["transcribeFile"]>>;
    try {
      response = await this.client.listen.prerecorded.transcribeFile(encodeWav(audio), {
        model: this.config.model,
        smart_format: true,
        mimetype: "audio/wav",
        ...(this.config.language ? { language: this.config.language } : {}),
      });
    } catch (err) {
      throw new TranscriptionError(errorMessage(err));
    }

    // The SDK reports API failures as a value rather than throwing
    if (response.error) {
      throw new TranscriptionError(response.error.message);
    }

    const transcript = response.result?.results?.channels?.[0]?.alternatives?.[0]?.transcript ?? "";
    const text = transcript.trim();
    this.logger.info(`Transcribed ${audioDurationMs(audio)}ms of audio with ${this.config.model} (${text.length} chars)`);
    return text;
  }
}
