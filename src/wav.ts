// Minimal RIFF/WAVE container for 16-bit PCM, used when uploading captured audio.

import type { CapturedAudio } from "./types.js";

export const WAV_HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;

export function encodeWav(audio: CapturedAudio): Buffer {
  const { pcm, sampleRate, channels } = audio;
  const blockAlign = channels * (BITS_PER_SAMPLE / 8);
  const header = Buffer.alloc(WAV_HEADER_SIZE);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28); // byte rate
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(BITS_PER_SAMPLE, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/** Duration of the captured PCM in milliseconds. */
export function audioDurationMs(audio: CapturedAudio): number {
  const bytesPerSecond = audio.sampleRate * audio.channels * (BITS_PER_SAMPLE / 8);
  return bytesPerSecond === 0 ? 0 : Math.round((audio.pcm.length / bytesPerSecond) * 1000);
}
