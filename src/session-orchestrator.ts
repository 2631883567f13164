// Dictation daemon - Session Orchestrator
// Owns the single recording session and drives the
// capture → transcribe → filter → type pipeline.
//
// Keyboard, remote (HTTP/WebSocket) and gesture triggers all call execute().
// Exactly one command is handled at a time: a command arriving while another
// is still awaiting capture I/O is rejected, never queued. Triggers are edge
// events, so replaying a backlog later would start or stop at the wrong moment.
//
// Privacy: captured audio is held in memory only and dropped once transcribed.

import { v4 as uuidv4 } from "uuid";
import { PttEventType, SessionState, TriggerSource } from "./types.js";
import type {
  CaptureHandle,
  CapturedAudio,
  CommandRejection,
  CommandResult,
  PttEvent,
  RecordingSession,
  RecordingStatus,
  TranscriptionHistoryEntry,
  TriggerCommand,
  TriggerKind,
} from "./types.js";
import type { NotificationHub } from "./notification-hub.js";
import { TranscriptionHistory } from "./transcription-history.js";
import { isHeldByOther, type MuteGate } from "./mute-gate.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { settlesWithin } from "./utils/timeout.js";

// ─── Collaborator contracts ─────────────────────────────────────────────────────

export interface AudioCapture {
  /** @throws DeviceUnavailableError when the input device cannot be opened. */
  startCapture(): Promise<CaptureHandle>;
  /** @throws DeviceUnavailableError when the recorder dies before handing over audio. */
  stopCapture(handle: CaptureHandle): Promise<CapturedAudio>;
}

export interface Transcriber {
  /** @throws TranscriptionError */
  transcribe(audio: CapturedAudio): Promise<string>;
}

export interface TextFilter {
  apply(text: string): string;
}

export interface Typer {
  /** @throws InputInjectionError */
  type(text: string): Promise<void>;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionOrchestratorDeps {
  audioCapture: AudioCapture;
  transcriber: Transcriber;
  typer: Typer;
  hub: NotificationHub;
  textFilter?: TextFilter;
  history?: TranscriptionHistory;
  muteGate?: MuteGate;
  /**
   * Hold the mute gate as MUTE_GATE_OWNER from Start until the session is back
   * to Idle, so other voice channels sharing the gate stay quiet while dictating.
   */
  claimMuteGate?: boolean;
  logger?: Logger;
  clock?: () => number;
}

/** Owner name the orchestrator uses on the mute gate. */
export const MUTE_GATE_OWNER = "dictation";

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

export const NO_SPEECH_MESSAGE = "No speech recognized";

const PASS_THROUGH_FILTER: TextFilter = { apply: (text) => text };

export function createCommand(kind: TriggerKind, source: TriggerSource, requestId: string = uuidv4()): TriggerCommand {
  return { kind, source, requestId };
}

export class SessionOrchestrator {
  private readonly deps: SessionOrchestratorDeps;
  private readonly history: TranscriptionHistory;
  private readonly textFilter: TextFilter;
  private readonly logger: Logger;
  private readonly clock: () => number;

  private session: RecordingSession = { state: SessionState.IDLE };
  private commandInFlight: Promise<CommandResult> | null = null;
  private transcriptionTask: Promise<void> | null = null;
  private repeatTask: Promise<boolean> | null = null;
  private gateClaimed = false;
  private shutdownPromise: Promise<boolean> | null = null;

  constructor(deps: SessionOrchestratorDeps) {
    this.deps = deps;
    this.history = deps.history ?? new TranscriptionHistory();
    this.textFilter = deps.textFilter ?? PASS_THROUGH_FILTER;
    this.logger = deps.logger ?? createLogger("SessionOrchestrator");
    this.clock = deps.clock ?? Date.now;

    this.logger.info(
      `Initialized (mute gate: ${deps.muteGate ? (deps.claimMuteGate ? "checked and claimed" : "checked") : "none"})`,
    );
  }

  // ─── Read-only state surface ────────────────────────────────────────────────

  get state(): SessionState {
    return this.session.state;
  }

  get isRecording(): boolean {
    return this.session.state === SessionState.RECORDING;
  }

  get isTranscribing(): boolean {
    return this.session.state === SessionState.TRANSCRIBING;
  }

  /** Milliseconds since recording started, or null when not recording. */
  get recordingDuration(): number | null {
    const session = this.session;
    if (session.state !== SessionState.RECORDING) return null;
    return this.clock() - session.startedAt;
  }

  status(): RecordingStatus {
    return {
      state: this.state,
      isRecording: this.isRecording,
      isTranscribing: this.isTranscribing,
      recordingDurationMs: this.recordingDuration,
    };
  }

  lastTranscription(): TranscriptionHistoryEntry | null {
    return this.history.last();
  }

  /**
   * Resolves once no command is in flight, no transcription is running and no
   * repeat is typing. A Stop still waiting on the recorder counts as in flight.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      const pending = this.commandInFlight ?? this.transcriptionTask ?? this.repeatTask;
      if (!pending) return;
      await pending;
    }
  }

  // ─── Command API ────────────────────────────────────────────────────────────

  async start(source: TriggerSource = TriggerSource.REMOTE): Promise<boolean> {
    return (await this.execute(createCommand("start", source))).occurred;
  }

  async stop(source: TriggerSource = TriggerSource.REMOTE): Promise<boolean> {
    return (await this.execute(createCommand("stop", source))).occurred;
  }

  async toggle(source: TriggerSource = TriggerSource.REMOTE): Promise<boolean> {
    return (await this.execute(createCommand("toggle", source))).occurred;
  }

  /**
   * Handles one trigger command. The in-flight slot is taken before the first
   * await, so two concurrent Start calls can never both observe Idle.
   */
  async execute(command: TriggerCommand): Promise<CommandResult> {
    if (this.shutdownPromise) {
      return this.reject(command, "shutting_down");
    }
    if (this.commandInFlight) {
      return this.reject(command, "command_in_progress");
    }

    return this.occupy(this.runCommand(command));
  }

  private async occupy(run: Promise<CommandResult>): Promise<CommandResult> {
    this.commandInFlight = run;
    try {
      return await run;
    } finally {
      this.commandInFlight = null;
    }
  }

  /**
   * Types the last transcription again without consuming it. Refused while a
   * transcription or another repeat is being typed out.
   */
  repeatLast(): Promise<boolean> {
    const entry = this.history.last();
    if (!entry) {
      this.logger.info("Repeat requested but no transcription in history");
      return Promise.resolve(false);
    }
    if (this.session.state === SessionState.TRANSCRIBING) {
      this.logger.warn("Repeat requested while transcribing, ignored");
      return Promise.resolve(false);
    }
    if (this.repeatTask) {
      this.logger.warn("Repeat requested while the previous repeat is typing, ignored");
      return Promise.resolve(false);
    }

    const task: Promise<boolean> = this.typeRepeat(entry).finally(() => {
      if (this.repeatTask === task) this.repeatTask = null;
    });
    this.repeatTask = task;
    return task;
  }

  private async typeRepeat(entry: TranscriptionHistoryEntry): Promise<boolean> {
    try {
      await this.deps.typer.type(entry.text);
      this.logger.info(`Repeated last transcription (${entry.text.length} chars)`);
      return true;
    } catch (err) {
      this.logger.warn(`Repeat failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // ─── Shutdown ───────────────────────────────────────────────────────────────

  /**
   * Stops accepting commands, forces Stop-and-process on a live recording and
   * waits up to `timeoutMs` for the transcription to finish. Captured audio is
   * never dropped. Resolves false when the wait timed out.
   */
  shutdown(timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<boolean> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(timeoutMs);
    }
    return this.shutdownPromise;
  }

  private async runShutdown(timeoutMs: number): Promise<boolean> {
    this.logger.info(`Shutting down (state=${this.session.state})`);

    if (this.commandInFlight) {
      await this.commandInFlight;
    }

    if (this.session.state === SessionState.RECORDING) {
      this.logger.info("Recording in progress at shutdown, stopping and processing captured audio");
      await this.occupy(this.stopAndProcess(createCommand("stop", TriggerSource.SHUTDOWN)));
    }

    let completed = true;
    const task = this.transcriptionTask;
    if (task) {
      completed = await settlesWithin(task, timeoutMs);
      if (!completed) {
        this.logger.warn(`Transcription still running after ${timeoutMs}ms, shutting down without it`);
      }
    }

    await this.releaseGateClaim();
    this.logger.info("Shutdown complete");
    return completed;
  }

  // ─── Transitions ────────────────────────────────────────────────────────────

  private runCommand(command: TriggerCommand): Promise<CommandResult> {
    this.logger.debug(`Command ${command.kind} from ${command.source} (${command.requestId}) in state ${this.session.state}`);

    switch (command.kind) {
      case "start":
        return this.handleStart(command);
      case "stop":
        return this.handleStop(command);
      case "toggle":
        if (this.session.state === SessionState.IDLE) return this.handleStart(command);
        if (this.session.state === SessionState.RECORDING) return this.handleStop(command);
        // Mid-flight pipeline is not cancellable by a new trigger
        return Promise.resolve(this.reject(command, "transcribing"));
      default: {
        const exhaustiveCheck: never = command.kind;
        throw new Error(`Unknown command kind: ${String(exhaustiveCheck)}`);
      }
    }
  }

  /** IDLE → RECORDING */
  private async handleStart(command: TriggerCommand): Promise<CommandResult> {
    if (this.session.state !== SessionState.IDLE) {
      return this.reject(command, "already_active");
    }

    if (!(await this.passMuteGate())) {
      return this.reject(command, "busy");
    }

    let handle: CaptureHandle;
    try {
      handle = await this.deps.audioCapture.startCapture();
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Audio capture failed to start: ${message}`);
      await this.releaseGateClaim();
      this.publish({ type: PttEventType.TRANSCRIPTION_FAILED, message, timestamp: this.clock() });
      return this.reject(command, "device_unavailable");
    }

    const startedAt = this.clock();
    this.session = { state: SessionState.RECORDING, startedAt, handle };
    this.logger.info(`Recording started (source=${command.source})`);
    this.publish({ type: PttEventType.RECORDING_STARTED, source: command.source, timestamp: startedAt });
    return this.accept(command);
  }

  /** RECORDING → TRANSCRIBING */
  private async handleStop(command: TriggerCommand): Promise<CommandResult> {
    if (this.session.state === SessionState.TRANSCRIBING) {
      return this.reject(command, "transcribing");
    }
    if (this.session.state !== SessionState.RECORDING) {
      return this.reject(command, "not_recording");
    }
    return this.stopAndProcess(command);
  }

  /**
   * Ends capture, publishes RECORDING_STOPPED and hands the audio to a background
   * transcription task. The event goes out before transcription begins so
   * listeners can show "processing" without waiting on ASR latency.
   */
  private async stopAndProcess(command: TriggerCommand): Promise<CommandResult> {
    const session = this.session;
    if (session.state !== SessionState.RECORDING) {
      return this.reject(command, "not_recording");
    }

    this.session = { state: SessionState.TRANSCRIBING, startedAt: session.startedAt };
    const durationMs = this.clock() - session.startedAt;

    let audio: CapturedAudio;
    try {
      audio = await this.deps.audioCapture.stopCapture(session.handle);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Audio capture failed to stop cleanly: ${message}`);
      this.publish({ type: PttEventType.RECORDING_STOPPED, durationMs, timestamp: this.clock() });
      this.publish({ type: PttEventType.TRANSCRIPTION_FAILED, message, timestamp: this.clock() });
      await this.finishSession();
      return this.accept(command);
    }

    this.logger.info(`Recording stopped after ${durationMs}ms (source=${command.source}, ${audio.pcm.length} bytes)`);
    this.publish({ type: PttEventType.RECORDING_STOPPED, durationMs, timestamp: this.clock() });

    const task: Promise<void> = this.processAudio(audio).finally(() => {
      if (this.transcriptionTask === task) this.transcriptionTask = null;
    });
    this.transcriptionTask = task;
    return this.accept(command);
  }

  /** TRANSCRIBING → IDLE. Never rejects: every failure becomes TRANSCRIPTION_FAILED. */
  private async processAudio(audio: CapturedAudio): Promise<void> {
    try {
      const raw = await this.deps.transcriber.transcribe(audio);
      const text = this.textFilter.apply(raw);

      if (text.length === 0) {
        this.logger.warn("Transcription produced no text after filtering");
        this.publish({ type: PttEventType.TRANSCRIPTION_FAILED, message: NO_SPEECH_MESSAGE, timestamp: this.clock() });
        return;
      }

      this.history.record(text, this.clock());

      // Keystrokes from a repeat still typing must not interleave with these
      if (this.repeatTask) await this.repeatTask;

      try {
        await this.deps.typer.type(text);
      } catch (err) {
        const message = errorMessage(err);
        this.logger.warn(`Typing transcription failed: ${message}`);
        this.publish({ type: PttEventType.TRANSCRIPTION_FAILED, message, timestamp: this.clock() });
        return;
      }

      this.logger.info(`Transcription completed (${text.length} chars)`);
      this.publish({ type: PttEventType.TRANSCRIPTION_COMPLETED, text, timestamp: this.clock() });
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Transcription failed: ${message}`);
      this.publish({ type: PttEventType.TRANSCRIPTION_FAILED, message, timestamp: this.clock() });
    } finally {
      await this.finishSession();
    }
  }

  private async finishSession(): Promise<void> {
    this.session = { state: SessionState.IDLE };
    await this.releaseGateClaim();
  }

  // ─── Mute gate ──────────────────────────────────────────────────────────────

  /**
   * Clears a MUTE_GATE_OWNER claim left on a shared gate by a run that exited
   * without releasing it. Call before accepting commands. Returns true when a
   * stale claim was removed.
   */
  async releaseStaleClaim(): Promise<boolean> {
    const gate = this.deps.muteGate;
    if (!gate || this.gateClaimed) return false;
    try {
      const released = await gate.release(MUTE_GATE_OWNER);
      if (released) this.logger.warn("Released a mute gate claim left by an earlier run");
      return released;
    } catch (err) {
      this.logger.error(`Failed to clear stale mute gate claim: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Returns false when another owner holds the gate. Unreadable gates count as held. */
  private async passMuteGate(): Promise<boolean> {
    const gate = this.deps.muteGate;
    if (!gate) return true;

    try {
      if (this.deps.claimMuteGate) {
        const acquired = await gate.acquire(MUTE_GATE_OWNER);
        if (acquired) this.gateClaimed = true;
        else this.logger.warn(`Start refused: mute gate held by ${await gate.holder()}`);
        return acquired;
      }
      if (await isHeldByOther(gate, MUTE_GATE_OWNER)) {
        this.logger.warn(`Start refused: mute gate held by ${await gate.holder()}`);
        return false;
      }
      return true;
    } catch (err) {
      this.logger.error(`Mute gate check failed, refusing to record: ${errorMessage(err)}`);
      return false;
    }
  }

  private async releaseGateClaim(): Promise<void> {
    const gate = this.deps.muteGate;
    if (!gate || !this.gateClaimed) return;
    this.gateClaimed = false;
    try {
      await gate.release(MUTE_GATE_OWNER);
    } catch (err) {
      this.logger.error(`Failed to release mute gate: ${errorMessage(err)}`);
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private publish(event: PttEvent): void {
    this.deps.hub.ptt.publish(Object.freeze(event));
  }

  private accept(command: TriggerCommand): CommandResult {
    return this.result(command, true, null);
  }

  private reject(command: TriggerCommand, rejection: CommandRejection): CommandResult {
    this.logger.info(`Command ${command.kind} from ${command.source} rejected: ${rejection} (state=${this.session.state})`);
    return this.result(command, false, rejection);
  }

  private result(command: TriggerCommand, occurred: boolean, rejection: CommandRejection | null): CommandResult {
    return {
      requestId: command.requestId,
      kind: command.kind,
      source: command.source,
      occurred,
      rejection,
      state: this.session.state,
    };
  }
}
