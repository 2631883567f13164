// ─── Gesture Pipeline ──────────────────────────────────────────────────────────
// Continuous camera loop: next hand frame → classify → stabilize → publish.
// Runs on its own cadence, independent of the recording session. Frame errors
// are logged and the loop backs off before polling again; they never escape.

import { setTimeout as sleep } from "node:timers/promises";
import type { HandFrame } from "./types.js";
import type { NotificationHub } from "./notification-hub.js";
import { GestureStabilizer } from "./gesture-stabilizer.js";
import { toGestureSample } from "./gesture-classifier.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export interface HandPoseSource {
  /**
   * Waits at most `timeoutMs` for the next processed frame.
   * Resolves null when no frame arrived in time; the caller simply polls again.
   */
  nextFrame(timeoutMs: number): Promise<HandFrame | null>;
}

export interface GesturePipelineConfig {
  /** Bounded wait for each camera frame. Default: 200 */
  frameTimeoutMs: number;
  /** Pause after a frame error before polling again. Default: 1000 */
  errorBackoffMs: number;
}

export const DEFAULT_PIPELINE_CONFIG: GesturePipelineConfig = {
  frameTimeoutMs: 200,
  errorBackoffMs: 1000,
};

export class GesturePipeline {
  private readonly source: HandPoseSource;
  private readonly stabilizer: GestureStabilizer;
  private readonly hub: NotificationHub;
  private readonly config: GesturePipelineConfig;
  private readonly logger: Logger;

  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private framesErrored = 0;

  constructor(
    source: HandPoseSource,
    stabilizer: GestureStabilizer,
    hub: NotificationHub,
    config: Partial<GesturePipelineConfig> = {},
    logger: Logger = createLogger("GesturePipeline"),
  ) {
    this.source = source;
    this.stabilizer = stabilizer;
    this.hub = hub;
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
    this.logger = logger;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  get errorCount(): number {
    return this.framesErrored;
  }

  /** Starts the loop in the background. Calling it twice is a no-op. */
  start(): void {
    if (this.loop) return;
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal);
    this.logger.info(`Gesture pipeline started (frame timeout ${this.config.frameTimeoutMs}ms)`);
  }

  /** Stops the loop, interrupting a back-off, and waits for the current tick to end. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.abort?.abort();
    await loop;
    this.loop = null;
    this.abort = null;
    this.stabilizer.reset();
    this.logger.info("Gesture pipeline stopped");
  }

  /**
   * One iteration: waits for a frame and publishes whatever events it produces.
   * Returns the number of events published.
   */
  async tick(): Promise<number> {
    const frame = await this.source.nextFrame(this.config.frameTimeoutMs);
    if (!frame) return 0;

    if (!frame.hand) {
      this.stabilizer.reset();
      return 0;
    }

    const sample = toGestureSample(frame.hand, frame.timestamp);
    const events = this.stabilizer.push(sample);
    for (const event of events) {
      this.hub.gestures.publish(event);
      if (event.isConfirmed) {
        this.logger.info(
          `Gesture confirmed: ${event.gestureType} (${event.isLeftHand ? "left" : "right"} hand, ${event.extendedFingers} fingers)`,
        );
      } else {
        this.logger.debug(`Gesture pending: ${event.gestureType} (${event.isLeftHand ? "left" : "right"} hand)`);
      }
    }
    return events.length;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.tick();
      } catch (err) {
        this.framesErrored++;
        this.logger.error(`Error during gesture detection: ${errorMessage(err)}`);
        await this.backOff(signal);
      }
    }
  }

  private async backOff(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.config.errorBackoffMs, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }
}
