// Environment configuration.
// loadConfig() reads every setting from an env map (process.env after
// dotenv/config) and reports all problems at once through ConfigError.

import type { GestureType, TriggerKind } from "./types.js";
import type { GestureStabilizerConfig } from "./gesture-stabilizer.js";
import { DEFAULT_STABILIZER_CONFIG } from "./gesture-stabilizer.js";
import { parseGestureBindings } from "./gesture-trigger.js";
import { DEFAULT_CAPTURE_COMMAND, splitCommandLine } from "./audio-capture.js";
import { DEFAULT_OPENAI_TRANSCRIBE_MODEL } from "./openai-transcriber.js";
import { DEFAULT_DEEPGRAM_MODEL } from "./deepgram-transcriber.js";
import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from "./session-orchestrator.js";
import { ConfigError } from "./errors.js";
import { errorMessage, isLogLevel, type LogLevel } from "./logger.js";

export type TranscriberBackend = "openai" | "deepgram";

export interface TranscriberConfig {
  backend: TranscriberBackend;
  apiKey: string;
  model: string;
  language?: string;
}

export interface CommandLine {
  command: string;
  args: string[];
}

export interface AppConfig {
  port: number;
  transcriber: TranscriberConfig;
  capture: CommandLine;
  /** Explicit typing command; undefined picks wtype/xdotool from the session type. */
  typerCommand?: string;
  /** Lock file shared with other voice channels; null keeps the gate in memory. */
  muteLockFile: string | null;
  claimMuteGate: boolean;
  keyboardTrigger: boolean;
  /** External hand-landmark process; null disables the gesture pipeline. */
  handPose: CommandLine | null;
  gestureBindings: Map<GestureType, TriggerKind>;
  stabilizer: GestureStabilizerConfig;
  shutdownTimeoutMs: number;
  hallucinationPhrases: string[];
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 5050;
export const DEFAULT_MUTE_LOCK_FILE = "/tmp/ptt-dictation-mute.lock";

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

class ConfigReader {
  readonly problems: string[] = [];
  private readonly env: Env;

  constructor(env: Env) {
    this.env = env;
  }

  string(name: string): string | undefined {
    return readString(this.env, name);
  }

  integer(name: string, fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
    const raw = this.string(name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      this.problems.push(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.string(name);
    if (raw === undefined) return fallback;
    switch (raw.toLowerCase()) {
      case "true":
      case "1":
      case "yes":
      case "on":
        return true;
      case "false":
      case "0":
      case "no":
      case "off":
        return false;
      default:
        this.problems.push(`${name} must be true or false, got "${raw}"`);
        return fallback;
    }
  }
}

function readTranscriber(reader: ConfigReader): TranscriberConfig | null {
  const backend = (reader.string("TRANSCRIBER_BACKEND") ?? "openai").toLowerCase();
  const language = reader.string("TRANSCRIBE_LANGUAGE");

  switch (backend) {
    case "openai": {
      const apiKey = reader.string("OPENAI_API_KEY");
      if (!apiKey) {
        reader.problems.push("OPENAI_API_KEY is not set. Add it to your .env file.");
        return null;
      }
      const model = reader.string("OPENAI_TRANSCRIBE_MODEL") ?? DEFAULT_OPENAI_TRANSCRIBE_MODEL;
      return { backend: "openai", apiKey, model, ...(language ? { language } : {}) };
    }
    case "deepgram": {
      const apiKey = reader.string("DEEPGRAM_API_KEY");
      if (!apiKey) {
        reader.problems.push("DEEPGRAM_API_KEY is not set. Add it to your .env file.");
        return null;
      }
      return { backend: "deepgram", apiKey, model: DEFAULT_DEEPGRAM_MODEL, ...(language ? { language } : {}) };
    }
    default:
      reader.problems.push(`TRANSCRIBER_BACKEND must be "openai" or "deepgram", got "${backend}"`);
      return null;
  }
}

/** @throws ConfigError listing every invalid or missing setting. */
export function loadConfig(env: Env = process.env): AppConfig {
  const reader = new ConfigReader(env);

  const port = reader.integer("PORT", DEFAULT_PORT, 0, 65535);
  const transcriber = readTranscriber(reader);

  const capture = splitCommandLine(reader.string("CAPTURE_COMMAND") ?? DEFAULT_CAPTURE_COMMAND);

  const lockSetting = reader.string("MUTE_LOCK_FILE") ?? DEFAULT_MUTE_LOCK_FILE;
  const muteLockFile = lockSetting.toLowerCase() === "memory" ? null : lockSetting;

  const handPoseCommand = reader.string("HAND_POSE_COMMAND");

  let gestureBindings = new Map<GestureType, TriggerKind>();
  try {
    gestureBindings = parseGestureBindings(reader.string("GESTURE_BINDINGS") ?? "");
  } catch (err) {
    reader.problems.push(`GESTURE_BINDINGS: ${errorMessage(err)}`);
  }
  if (gestureBindings.size > 0 && !handPoseCommand) {
    reader.problems.push("GESTURE_BINDINGS requires HAND_POSE_COMMAND");
  }

  const logLevel = (reader.string("LOG_LEVEL") ?? "info").toLowerCase();
  if (!isLogLevel(logLevel)) {
    reader.problems.push(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const config = {
    port,
    capture,
    typerCommand: reader.string("TYPER_COMMAND"),
    muteLockFile,
    claimMuteGate: reader.boolean("CLAIM_MUTE_GATE", false),
    keyboardTrigger: reader.boolean("KEYBOARD_TRIGGER", true),
    handPose: handPoseCommand ? splitCommandLine(handPoseCommand) : null,
    gestureBindings,
    stabilizer: {
      stableFramesRequired: reader.integer(
        "GESTURE_STABLE_FRAMES",
        DEFAULT_STABILIZER_CONFIG.stableFramesRequired,
        1,
      ),
      cooldownMs: reader.integer("GESTURE_COOLDOWN_MS", DEFAULT_STABILIZER_CONFIG.cooldownMs, 0),
    },
    shutdownTimeoutMs: reader.integer("SHUTDOWN_TIMEOUT_MS", DEFAULT_SHUTDOWN_TIMEOUT_MS, 0),
    hallucinationPhrases: (reader.string("HALLUCINATION_PHRASES") ?? "")
      .split("|")
      .map((phrase) => phrase.trim())
      .filter((phrase) => phrase.length > 0),
  };

  if (reader.problems.length > 0 || !transcriber || !isLogLevel(logLevel)) {
    throw new ConfigError(reader.problems);
  }

  return { ...config, transcriber, logLevel };
}
