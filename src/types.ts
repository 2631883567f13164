// Dictation daemon - Shared TypeScript interfaces and types
// Session state machine, trigger commands, lifecycle events and gesture data.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  RECORDING = "recording",
  TRANSCRIBING = "transcribing",
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── Trigger Commands ───────────────────────────────────────────────────────────

export type TriggerKind = "start" | "stop" | "toggle";

export enum TriggerSource {
  KEYBOARD = "keyboard",
  REMOTE = "remote",
  GESTURE = "gesture",
  /** Forced stop issued by the orchestrator itself during teardown. */
  SHUTDOWN = "shutdown",
}

export interface TriggerCommand {
  kind: TriggerKind;
  source: TriggerSource;
  requestId: string;
}

export type CommandRejection =
  | "already_active"
  | "not_recording"
  | "transcribing"
  | "busy"
  | "command_in_progress"
  | "device_unavailable"
  | "shutting_down";

export interface CommandResult {
  requestId: string;
  kind: TriggerKind;
  source: TriggerSource;
  /** True when the requested transition actually happened. */
  occurred: boolean;
  rejection: CommandRejection | null;
  /** Orchestrator state once the command was handled. */
  state: SessionState;
}

// ─── Recording Session ──────────────────────────────────────────────────────────

export interface CaptureHandle {
  id: string;
}

export interface CapturedAudio {
  pcm: Buffer; // 16-bit little-endian PCM
  sampleRate: number;
  channels: number;
}

/** The single recording session; only the orchestrator writes it. */
export type RecordingSession =
  | { state: SessionState.IDLE }
  | { state: SessionState.RECORDING; startedAt: number; handle: CaptureHandle }
  | { state: SessionState.TRANSCRIBING; startedAt: number };

export interface TranscriptionHistoryEntry {
  text: string;
  timestamp: number;
}

// ─── PTT Lifecycle Events ───────────────────────────────────────────────────────

export enum PttEventType {
  RECORDING_STARTED = "recording_started",
  RECORDING_STOPPED = "recording_stopped",
  TRANSCRIPTION_COMPLETED = "transcription_completed",
  TRANSCRIPTION_FAILED = "transcription_failed",
}

export type PttEvent =
  | { readonly type: PttEventType.RECORDING_STARTED; readonly source: TriggerSource; readonly timestamp: number }
  | { readonly type: PttEventType.RECORDING_STOPPED; readonly durationMs: number; readonly timestamp: number }
  | { readonly type: PttEventType.TRANSCRIPTION_COMPLETED; readonly text: string; readonly timestamp: number }
  | { readonly type: PttEventType.TRANSCRIPTION_FAILED; readonly message: string; readonly timestamp: number };

// ─── Hand Pose & Gestures ───────────────────────────────────────────────────────

export enum GestureType {
  NONE = "none",
  FIST = "fist",
  POINTING_UP = "pointing_up",
  VICTORY = "victory",
  OPEN_PALM = "open_palm",
  OK = "ok",
}

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

/** 21 MediaPipe-ordered landmarks, normalized 0..1 with a top-left image origin. */
export interface HandLandmarks {
  landmarks: Point3D[];
  score: number;
  isLeftHand: boolean;
}

export interface HandFrame {
  /** null when the frame was processed but no hand was found. */
  hand: HandLandmarks | null;
  timestamp: number;
}

export interface GestureSample {
  label: GestureType;
  confidence: number;
  isLeftHand: boolean;
  extendedFingerCount: number;
  timestamp: number;
}

export interface GestureEvent {
  readonly gestureType: GestureType;
  readonly isLeftHand: boolean;
  readonly confidence: number;
  readonly extendedFingers: number;
  readonly isConfirmed: boolean;
  readonly timestamp: number;
}

// ─── Remote Surface ─────────────────────────────────────────────────────────────

export interface RecordingStatus {
  state: SessionState;
  isRecording: boolean;
  isTranscribing: boolean;
  recordingDurationMs: number | null;
}

export type ClientMessage =
  | { type: "start_recording" }
  | { type: "stop_recording" }
  | { type: "toggle_recording" };

export type ServerMessage =
  | ({ type: "status" } & RecordingStatus)
  | { type: "ptt_event"; event: PttEvent }
  | { type: "gesture_event"; event: GestureEvent }
  | { type: "command_result"; result: CommandResult }
  | { type: "error"; message: string };
