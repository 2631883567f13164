// Hand pose source backed by an external landmark process.
// The process (a camera + hand-landmark model) writes one JSON object per line:
//
//   {"hand": null}
//   {"hand": {"landmarks": [[x, y, z], ...21], "score": 0.93, "handedness": "right"}, "timestamp": 1712}
//
// Coordinates are normalized 0..1 with a top-left origin. Frames are buffered in
// a small drop-oldest queue so the gesture loop always sees recent poses.

import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import type { HandFrame, HandLandmarks, Point3D } from "./types.js";
import type { HandPoseSource } from "./gesture-pipeline.js";
import { FrameQueue } from "./frame-queue.js";
import { LANDMARK_COUNT } from "./gesture-classifier.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export interface JsonLinesHandPoseSourceOptions {
  /** Frames kept while the consumer is busy. Default: 5 */
  queueSize?: number;
  logger?: Logger;
  clock?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPoint(value: unknown, index: number): Point3D {
  if (!Array.isArray(value)) {
    throw new Error(`Landmark ${index} must be an [x, y, z] array`);
  }
  const coords: unknown[] = value;
  const [x, y, z = 0] = coords;
  if (typeof x !== "number" || typeof y !== "number" || typeof z !== "number") {
    throw new Error(`Landmark ${index} has non-numeric coordinates`);
  }
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    throw new Error(`Landmark ${index} has non-finite coordinates`);
  }
  return { x, y, z };
}

function toHand(value: unknown): HandLandmarks {
  if (!isRecord(value)) {
    throw new Error("\"hand\" must be an object or null");
  }

  const { landmarks, score = 1, handedness } = value;
  if (!Array.isArray(landmarks) || landmarks.length !== LANDMARK_COUNT) {
    throw new Error(`"landmarks" must hold exactly ${LANDMARK_COUNT} points`);
  }
  if (typeof score !== "number" || score < 0 || score > 1) {
    throw new Error("\"score\" must be a number between 0 and 1");
  }
  if (typeof handedness !== "string") {
    throw new Error("\"handedness\" must be \"left\" or \"right\"");
  }
  const side = handedness.toLowerCase();
  if (side !== "left" && side !== "right") {
    throw new Error(`Unknown handedness: ${handedness}`);
  }

  const points: unknown[] = landmarks;
  return {
    landmarks: points.map((point, i) => toPoint(point, i)),
    score,
    isLeftHand: side === "left",
  };
}

/**
 * Parses one line of landmark output. Frames without a "timestamp" field are
 * stamped with `receivedAt`.
 * @throws Error describing the first problem found.
 */
export function parseHandFrame(line: string, receivedAt: number): HandFrame {
  const data: unknown = JSON.parse(line);
  if (!isRecord(data)) {
    throw new Error("Frame must be a JSON object");
  }

  let timestamp = receivedAt;
  if (data.timestamp !== undefined) {
    if (typeof data.timestamp !== "number" || !Number.isFinite(data.timestamp)) {
      throw new Error("\"timestamp\" must be a number");
    }
    timestamp = data.timestamp;
  }

  if (data.hand === null || data.hand === undefined) {
    return { hand: null, timestamp };
  }
  return { hand: toHand(data.hand), timestamp };
}

export class JsonLinesHandPoseSource implements HandPoseSource {
  private readonly queue: FrameQueue<HandFrame>;
  private readonly lines: Interface;
  private readonly logger: Logger;
  private readonly clock: () => number;

  private wake: (() => void) | null = null;
  private closed = false;
  private malformed = 0;

  constructor(input: Readable, options: JsonLinesHandPoseSourceOptions = {}) {
    this.queue = new FrameQueue<HandFrame>(options.queueSize ?? 5);
    this.logger = options.logger ?? createLogger("HandPoseSource");
    this.clock = options.clock ?? Date.now;

    this.lines = createInterface({ input, crlfDelay: Infinity });
    this.lines.on("line", (line) => this.handleLine(line));
    this.lines.on("close", () => {
      this.closed = true;
      this.logger.warn("Hand landmark stream ended; no further frames will arrive");
      this.notify();
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get malformedLines(): number {
    return this.malformed;
  }

  get framesDropped(): number {
    return this.queue.framesDroppedByBackpressure;
  }

  async nextFrame(timeoutMs: number): Promise<HandFrame | null> {
    const queued = this.queue.dequeue();
    if (queued) return queued;

    await new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        if (this.wake === done) this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      // A closed stream still waits out the timeout so the caller does not spin
      if (!this.closed) this.wake = done;
    });

    return this.queue.dequeue();
  }

  /** Stops reading and discards frames nobody has taken yet. */
  close(): void {
    this.lines.close();
    this.queue.clear();
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (trimmed.length === 0) return;

    try {
      this.queue.enqueue(parseHandFrame(trimmed, this.clock()));
    } catch (err) {
      this.malformed++;
      this.logger.warn(`Skipping malformed hand frame: ${errorMessage(err)}`);
      return;
    }
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
