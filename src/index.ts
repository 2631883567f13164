#!/usr/bin/env node
// Push-to-talk dictation daemon - Entry point
// Wires configuration, collaborators, triggers and the remote control server.

import "dotenv/config";
import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable } from "node:stream";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { setLogLevel, errorMessage } from "./logger.js";
import { NotificationHub } from "./notification-hub.js";
import { SessionOrchestrator, type Transcriber } from "./session-orchestrator.js";
import { TranscriptionHistory } from "./transcription-history.js";
import { HallucinationFilter } from "./text-filter.js";
import { ProcessAudioCapture } from "./audio-capture.js";
import { CommandTyper, resolveTyperCommand } from "./typer.js";
import { OpenAITranscriber } from "./openai-transcriber.js";
import type { OpenAITranscriptionClient } from "./openai-transcriber.js";
import { DeepgramTranscriber } from "./deepgram-transcriber.js";
import type { DeepgramPrerecordedClient } from "./deepgram-transcriber.js";
import { FileMuteGate, InMemoryMuteGate, type MuteGate } from "./mute-gate.js";
import { GestureStabilizer } from "./gesture-stabilizer.js";
import { GesturePipeline } from "./gesture-pipeline.js";
import { JsonLinesHandPoseSource } from "./hand-pose-source.js";
import { GestureTrigger } from "./gesture-trigger.js";
import { KeyboardTrigger } from "./keyboard-trigger.js";
import { IndicatorBridge, LoggingIndicatorSink } from "./indicator-bridge.js";
import { createAppServer } from "./server.js";

export const APP_NAME = "PTT Dictation";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (err instanceof ConfigError) {
    for (const problem of err.problems) logFatal(problem);
  } else {
    logFatal(`Failed to load configuration: ${errorMessage(err)}`);
  }
  process.exit(1);
}

setLogLevel(config.logLevel);
logInit("Configuration loaded");

// ─── Initialize collaborators ───────────────────────────────────────────────────

function createTranscriber(cfg: AppConfig["transcriber"]): Transcriber {
  const options = { model: cfg.model, ...(cfg.language ? { language: cfg.language } : {}) };
  switch (cfg.backend) {
    case "openai": {
      logInit(`Creating OpenAI client (model ${cfg.model})...`);
      const openaiClient = new OpenAI({ apiKey: cfg.apiKey });
      return new OpenAITranscriber(openaiClient as unknown as OpenAITranscriptionClient, options);
    }
    case "deepgram": {
      logInit(`Creating Deepgram client (model ${cfg.model})...`);
      const deepgramClient = createDeepgramClient(cfg.apiKey);
      return new DeepgramTranscriber(deepgramClient as unknown as DeepgramPrerecordedClient, options);
    }
    default: {
      const exhaustiveCheck: never = cfg.backend;
      throw new Error(`Unknown transcriber backend: ${String(exhaustiveCheck)}`);
    }
  }
}

const transcriber = createTranscriber(config.transcriber);

logInit(`Initializing audio capture (${config.capture.command})...`);
const audioCapture = new ProcessAudioCapture({ command: config.capture.command, args: config.capture.args });

const typerCommand = resolveTyperCommand(config.typerCommand, process.env);
logInit(`Initializing typer (${typerCommand.command})...`);
const typer = new CommandTyper(typerCommand);

const muteGate: MuteGate = config.muteLockFile ? new FileMuteGate(config.muteLockFile) : new InMemoryMuteGate();
logInit(`Mute gate: ${config.muteLockFile ?? "in-memory"}`);

// ─── Create orchestrator and listeners ──────────────────────────────────────────

const hub = new NotificationHub();

logInit("Wiring SessionOrchestrator pipeline...");
const orchestrator = new SessionOrchestrator({
  audioCapture,
  transcriber,
  typer,
  hub,
  textFilter: new HallucinationFilter(config.hallucinationPhrases),
  history: new TranscriptionHistory(),
  muteGate,
  claimMuteGate: config.claimMuteGate,
});

const indicator = new IndicatorBridge(hub, new LoggingIndicatorSink());

let handPoseProcess: ChildProcessByStdio<null, Readable, null> | null = null;
let handPoseSource: JsonLinesHandPoseSource | null = null;
let pipeline: GesturePipeline | null = null;
let gestureTrigger: GestureTrigger | null = null;

if (config.handPose) {
  const { command, args } = config.handPose;
  logInit(`Starting hand landmark process (${command})...`);
  const child = spawn(command, args, { stdio: ["ignore", "pipe", "inherit"] });
  child.on("error", (err) => logFatal(`Hand landmark process failed: ${err.message}`));
  handPoseProcess = child;
  handPoseSource = new JsonLinesHandPoseSource(child.stdout);
  pipeline = new GesturePipeline(handPoseSource, new GestureStabilizer(config.stabilizer), hub);
  gestureTrigger = new GestureTrigger(hub, orchestrator, config.gestureBindings);
}

const keyboard = config.keyboardTrigger ? new KeyboardTrigger(orchestrator) : null;

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ orchestrator, hub, muteGate });

async function start(): Promise<void> {
  // A lock file outlives the process; in-memory gates start empty
  if (config.muteLockFile) await orchestrator.releaseStaleClaim();
  await indicator.start();
  pipeline?.start();
  gestureTrigger?.start();
  keyboard?.start(process.stdin);
  await server.listen(config.port);
}

start().then(
  () => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit("Pipeline: capture → transcribe → filter → type");
    logInit("Ready for commands");
  },
  (err: unknown) => {
    logFatal(`Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  },
);

// ─── Graceful shutdown ──────────────────────────────────────────────────────────

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  logInit(`${signal} received, shutting down...`);

  keyboard?.stop();
  gestureTrigger?.stop();
  await pipeline?.stop();
  handPoseSource?.close();
  handPoseProcess?.kill();

  const completed = await orchestrator.shutdown(config.shutdownTimeoutMs);
  await hub.drain();
  indicator.stop();
  await server.close();
  logInit(completed ? "Shutdown complete" : "Shutdown complete (transcription abandoned after timeout)");
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  });
}
