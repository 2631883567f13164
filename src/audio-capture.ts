// Audio capture through an external recorder process.
// The recorder writes raw 16-bit little-endian PCM to stdout
// (default: pw-record --rate 16000 --channels 1 --format s16 -) and is stopped
// with SIGINT, which lets it flush before exiting.
//
// Privacy: PCM is buffered in memory only and handed to the caller on stop.

import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";
import { v4 as uuidv4 } from "uuid";
import type { CaptureHandle, CapturedAudio } from "./types.js";
import type { AudioCapture } from "./session-orchestrator.js";
import { DeviceUnavailableError } from "./errors.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export interface RecorderProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type RecorderSpawner = (command: string, args: readonly string[]) => RecorderProcess;

export interface ProcessAudioCaptureConfig {
  command: string;
  args: readonly string[];
  sampleRate: number;
  channels: number;
  /** Time allowed for the recorder to exit after SIGINT before it is killed. */
  stopTimeoutMs: number;
}

export const DEFAULT_CAPTURE_COMMAND = "pw-record --rate 16000 --channels 1 --format s16 -";

export const DEFAULT_CAPTURE_CONFIG: ProcessAudioCaptureConfig = {
  command: "pw-record",
  args: ["--rate", "16000", "--channels", "1", "--format", "s16", "-"],
  sampleRate: 16000,
  channels: 1,
  stopTimeoutMs: 2000,
};

/** Keeps the tail of the recorder's stderr for error messages. */
const STDERR_TAIL_BYTES = 512;

const defaultSpawner: RecorderSpawner = (command, args) =>
  spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface ActiveRecording {
  process: RecorderProcess;
  chunks: Buffer[];
  stderr: string;
  exited: Promise<ExitStatus>;
  exitStatus: ExitStatus | null;
  stopping: boolean;
}

/** Splits a command line on whitespace; quoting is not supported. */
export function splitCommandLine(commandLine: string): { command: string; args: string[] } {
  const [command = "", ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
}

export class ProcessAudioCapture implements AudioCapture {
  private readonly config: ProcessAudioCaptureConfig;
  private readonly spawner: RecorderSpawner;
  private readonly logger: Logger;
  private readonly recordings = new Map<string, ActiveRecording>();

  constructor(
    config: Partial<ProcessAudioCaptureConfig> = {},
    spawner: RecorderSpawner = defaultSpawner,
    logger: Logger = createLogger("AudioCapture"),
  ) {
    this.config = { ...DEFAULT_CAPTURE_CONFIG, ...config };
    this.spawner = spawner;
    this.logger = logger;
  }

  get activeCount(): number {
    return this.recordings.size;
  }

  async startCapture(): Promise<CaptureHandle> {
    const { command, args } = this.config;
    let child: RecorderProcess;
    try {
      child = this.spawner(command, args);
    } catch (err) {
      throw new DeviceUnavailableError(`Failed to launch recorder "${command}": ${errorMessage(err)}`);
    }

    const recording: ActiveRecording = {
      process: child,
      chunks: [],
      stderr: "",
      exited: new Promise<ExitStatus>((resolve) => {
        child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
          recording.exitStatus = { code, signal };
          if (!recording.stopping) {
            this.logger.warn(`Recorder exited while recording (code=${code}, signal=${signal})`);
          }
          resolve({ code, signal });
        });
      }),
      exitStatus: null,
      stopping: false,
    };

    child.stdout?.on("data", (chunk: Buffer) => recording.chunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => {
      recording.stderr = (recording.stderr + chunk.toString("utf-8")).slice(-STDERR_TAIL_BYTES);
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        child.off("spawn", onSpawn);
        recording.stopping = true;
        reject(new DeviceUnavailableError(`Failed to launch recorder "${command}": ${err.message}`));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    child.on("error", (err: Error) => {
      this.logger.error(`Recorder error: ${err.message}`);
    });

    const handle: CaptureHandle = { id: uuidv4() };
    this.recordings.set(handle.id, recording);
    this.logger.info(`Recorder started: ${command} ${args.join(" ")}`);
    return handle;
  }

  async stopCapture(handle: CaptureHandle): Promise<CapturedAudio> {
    const recording = this.recordings.get(handle.id);
    if (!recording) {
      throw new DeviceUnavailableError(`Unknown capture handle: ${handle.id}`);
    }
    this.recordings.delete(handle.id);

    const diedEarly = recording.exitStatus;
    if (diedEarly && diedEarly.code !== 0) {
      throw new DeviceUnavailableError(this.describeExit("Recorder died before stop", diedEarly, recording.stderr));
    }

    recording.stopping = true;
    if (!diedEarly) {
      recording.process.kill("SIGINT");
      const killTimer = setTimeout(() => {
        this.logger.warn(`Recorder ignored SIGINT for ${this.config.stopTimeoutMs}ms, killing it`);
        recording.process.kill("SIGKILL");
      }, this.config.stopTimeoutMs);
      try {
        await recording.exited;
      } finally {
        clearTimeout(killTimer);
      }
    }

    const pcm = this.wholeFrames(Buffer.concat(recording.chunks));
    recording.chunks = [];
    if (pcm.length === 0 && recording.stderr.trim().length > 0) {
      throw new DeviceUnavailableError(`Recorder produced no audio: ${recording.stderr.trim()}`);
    }

    this.logger.info(`Recorder stopped (${pcm.length} bytes)`);
    return { pcm, sampleRate: this.config.sampleRate, channels: this.config.channels };
  }

  private wholeFrames(pcm: Buffer): Buffer {
    const frameSize = this.config.channels * 2;
    const usable = pcm.length - (pcm.length % frameSize);
    return usable === pcm.length ? pcm : pcm.subarray(0, usable);
  }

  private describeExit(prefix: string, status: ExitStatus, stderr: string): string {
    const detail = stderr.trim();
    return `${prefix} (code=${status.code}, signal=${status.signal})${detail ? `: ${detail}` : ""}`;
  }
}
