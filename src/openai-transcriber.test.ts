import { describe, it, expect, vi } from "vitest";
import { OpenAITranscriber, type OpenAITranscriptionClient } from "./openai-transcriber.js";
import { TranscriptionError } from "./errors.js";
import { WAV_HEADER_SIZE } from "./wav.js";

function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

type CreateParams = Parameters<OpenAITranscriptionClient["audio"]["transcriptions"]["create"]>[0];

function createMockClient(respond: (params: CreateParams) => Promise<{ text: string }>) {
  const create = vi.fn(respond);
  const client: OpenAITranscriptionClient = { audio: { transcriptions: { create } } };
  return { client, create };
}

const audio = { pcm: Buffer.alloc(3200), sampleRate: 16000, channels: 1 };

describe("OpenAITranscriber", () => {
  it("uploads the audio as a WAV file and returns trimmed text", async () => {
    const { client, create } = createMockClient(async () => ({ text: "  Hello there.  " }));
    const transcriber = new OpenAITranscriber(client, {}, createSilentLogger());

    expect(await transcriber.transcribe(audio)).toBe("Hello there.");

    const params = create.mock.calls[0]![0];
    expect(params.model).toBe("whisper-1");
    expect(params.response_format).toBe("json");
    expect(params.file.name).toBe("dictation.wav");
    expect(params.file.type).toBe("audio/wav");
    expect(params.file.size).toBe(WAV_HEADER_SIZE + 3200);
    expect(params).not.toHaveProperty("language");
  });

  it("passes the configured model, language and prompt", async () => {
    const { client, create } = createMockClient(async () => ({ text: "hallo" }));
    const transcriber = new OpenAITranscriber(
      client,
      { model: "gpt-4o-mini-transcribe", language: "de", prompt: "TypeScript, Vitest" },
      createSilentLogger(),
    );

    await transcriber.transcribe(audio);

    expect(create.mock.calls[0]![0]).toMatchObject({
      model: "gpt-4o-mini-transcribe",
      language: "de",
      prompt: "TypeScript, Vitest",
    });
  });

  it("skips the request for empty audio", async () => {
    const { client, create } = createMockClient(async () => ({ text: "should not be used" }));
    const transcriber = new OpenAITranscriber(client, {}, createSilentLogger());

    expect(await transcriber.transcribe({ ...audio, pcm: Buffer.alloc(0) })).toBe("");
    expect(create).not.toHaveBeenCalled();
  });

  it("wraps API errors in TranscriptionError", async () => {
    const { client } = createMockClient(async () => {
      throw new Error("429 Rate limit reached");
    });
    const transcriber = new OpenAITranscriber(client, {}, createSilentLogger());

    const failure = transcriber.transcribe(audio);
    await expect(failure).rejects.toBeInstanceOf(TranscriptionError);
    await expect(failure).rejects.toThrow("Transcription failed: 429 Rate limit reached");
  });
});
