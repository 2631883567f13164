import { describe, it, expect, vi } from "vitest";
import {
  DeepgramTranscriber,
  type DeepgramPrerecordedClient,
  type DeepgramPrerecordedResult,
} from "./deepgram-transcriber.js";
import { TranscriptionError } from "./errors.js";

function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

type TranscribeFile = DeepgramPrerecordedClient["listen"]["prerecorded"]["transcribeFile"];

function createMockClient(respond: TranscribeFile) {
  const transcribeFile = vi.fn(respond);
  const client: DeepgramPrerecordedClient = { listen: { prerecorded: { transcribeFile } } };
  return { client, transcribeFile };
}

function resultWith(transcript: string): DeepgramPrerecordedResult {
  return { results: { channels: [{ alternatives: [{ transcript, confidence: 0.98 }] }] } };
}

const audio = { pcm: Buffer.alloc(320), sampleRate: 16000, channels: 1 };

describe("DeepgramTranscriber", () => {
  it("returns the first alternative's transcript", async () => {
    const { client, transcribeFile } = createMockClient(async () => ({
      result: resultWith(" Buy milk. "),
      error: null,
    }));
    const transcriber = new DeepgramTranscriber(client, { language: "en" }, createSilentLogger());

    expect(await transcriber.transcribe(audio)).toBe("Buy milk.");

    const [source, options] = transcribeFile.mock.calls[0]!;
    expect(source.toString("ascii", 0, 4)).toBe("RIFF");
    expect(options).toEqual({ model: "nova-2", smart_format: true, mimetype: "audio/wav", language: "en" });
  });

  it("returns empty text when the response has no alternatives", async () => {
    const { client } = createMockClient(async () => ({ result: { results: { channels: [] } }, error: null }));
    const transcriber = new DeepgramTranscriber(client, {}, createSilentLogger());

    expect(await transcriber.transcribe(audio)).toBe("");
  });

  it("turns an error value into TranscriptionError", async () => {
    const { client } = createMockClient(async () => ({ result: null, error: { message: "Invalid credentials" } }));
    const transcriber = new DeepgramTranscriber(client, {}, createSilentLogger());

    const failure = transcriber.transcribe(audio);
    await expect(failure).rejects.toBeInstanceOf(TranscriptionError);
    await expect(failure).rejects.toThrow("Transcription failed: Invalid credentials");
  });

  it("turns a thrown error into TranscriptionError", async () => {
    const { client } = createMockClient(async () => {
      throw new Error("socket hang up");
    });
    const transcriber = new DeepgramTranscriber(client, {}, createSilentLogger());

    await expect(transcriber.transcribe(audio)).rejects.toThrow("Transcription failed: socket hang up");
  });

  it("skips the request for empty audio", async () => {
    const { client, transcribeFile } = createMockClient(async () => ({ result: resultWith("x"), error: null }));
    const transcriber = new DeepgramTranscriber(client, {}, createSilentLogger());

    expect(await transcriber.transcribe({ ...audio, pcm: Buffer.alloc(0) })).toBe("");
    expect(transcribeFile).not.toHaveBeenCalled();
  });
});
