// ─── Gesture Stabilizer ────────────────────────────────────────────────────────
// Turns the noisy per-frame gesture labels into pending and confirmed events.
// A label change emits a pending event at once (visual feedback only); the same
// label held for `stableFramesRequired` consecutive frames emits a confirmed
// event, at most once per `cooldownMs` across the whole stream.

import { GestureType } from "./types.js";
import type { GestureEvent, GestureSample } from "./types.js";

export interface GestureStabilizerConfig {
  /** Consecutive identical samples needed before a gesture is confirmed. Default: 3 */
  stableFramesRequired: number;
  /** Minimum time between two confirmed events, measured on sample timestamps. Default: 500 */
  cooldownMs: number;
}

export const DEFAULT_STABILIZER_CONFIG: GestureStabilizerConfig = {
  stableFramesRequired: 3,
  cooldownMs: 500,
};

export class GestureStabilizer {
  private readonly config: GestureStabilizerConfig;
  private lastLabel: GestureType = GestureType.NONE;
  private consecutiveCount = 0;
  private lastConfirmedAt = Number.NEGATIVE_INFINITY;

  constructor(config: Partial<GestureStabilizerConfig> = {}) {
    this.config = { ...DEFAULT_STABILIZER_CONFIG, ...config };
    if (!Number.isInteger(this.config.stableFramesRequired) || this.config.stableFramesRequired < 1) {
      throw new Error(`Invalid stableFramesRequired: ${this.config.stableFramesRequired}. Must be a positive integer.`);
    }
    if (this.config.cooldownMs < 0) {
      throw new Error(`Invalid cooldownMs: ${this.config.cooldownMs}. Must be >= 0.`);
    }
  }

  /** Feeds one classified frame; returns the events it produced, pending before confirmed. */
  push(sample: GestureSample): GestureEvent[] {
    const events: GestureEvent[] = [];

    if (sample.label === this.lastLabel && sample.label !== GestureType.NONE) {
      this.consecutiveCount++;
    } else {
      this.lastLabel = sample.label;
      this.consecutiveCount = 1;
      if (sample.label !== GestureType.NONE) {
        events.push(toEvent(sample, false));
      }
    }

    if (
      sample.label !== GestureType.NONE &&
      this.consecutiveCount >= this.config.stableFramesRequired &&
      sample.timestamp - this.lastConfirmedAt > this.config.cooldownMs
    ) {
      events.push(toEvent(sample, true));
      this.lastConfirmedAt = sample.timestamp;
    }

    return events;
  }

  /** No hand in the frame. Absence is not debounced; the run simply ends. */
  reset(): void {
    this.lastLabel = GestureType.NONE;
    this.consecutiveCount = 0;
  }

  get currentLabel(): GestureType {
    return this.lastLabel;
  }

  get currentRunLength(): number {
    return this.consecutiveCount;
  }
}

function toEvent(sample: GestureSample, isConfirmed: boolean): GestureEvent {
  return Object.freeze({
    gestureType: sample.label,
    isLeftHand: sample.isLeftHand,
    confidence: sample.confidence,
    extendedFingers: sample.extendedFingerCount,
    isConfirmed,
    timestamp: sample.timestamp,
  });
}
