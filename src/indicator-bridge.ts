// Indicator Bridge
// Turns hub events into indicator updates: a "transcribing" indicator shown
// between RECORDING_STOPPED and the end of transcription, and one gesture icon
// per hand. Rendering is left to an IndicatorSink.

import { PttEventType } from "./types.js";
import type { GestureEvent, PttEvent } from "./types.js";
import type { NotificationHub, Unsubscribe } from "./notification-hub.js";
import { GestureIconTable } from "./gesture-icons.js";
import { createLogger, type Logger } from "./logger.js";

export interface IndicatorSink {
  showTranscribing(): void | Promise<void>;
  hideTranscribing(): void | Promise<void>;
  setHandIcon(isLeftHand: boolean, icon: string): void | Promise<void>;
}

/** Sink that only writes log lines; used when no desktop indicator is attached. */
export class LoggingIndicatorSink implements IndicatorSink {
  private readonly logger: Logger;
  private readonly handIcons = new Map<"left" | "right", string>();

  constructor(logger: Logger = createLogger("Indicator")) {
    this.logger = logger;
  }

  showTranscribing(): void {
    this.logger.info("Transcribing…");
  }

  hideTranscribing(): void {
    this.logger.debug("Transcribing indicator hidden");
  }

  setHandIcon(isLeftHand: boolean, icon: string): void {
    const side = isLeftHand ? "left" : "right";
    if (this.handIcons.get(side) === icon) return;
    this.handIcons.set(side, icon);
    this.logger.debug(`${side} hand icon → ${icon}`);
  }
}

export class IndicatorBridge {
  private readonly hub: NotificationHub;
  private readonly sink: IndicatorSink;
  private readonly icons: GestureIconTable;
  private readonly logger: Logger;
  private unsubscribers: Unsubscribe[] = [];
  private transcribing = false;

  constructor(
    hub: NotificationHub,
    sink: IndicatorSink,
    icons: GestureIconTable = new GestureIconTable(),
    logger: Logger = createLogger("IndicatorBridge"),
  ) {
    this.hub = hub;
    this.sink = sink;
    this.icons = icons;
    this.logger = logger;
  }

  get isTranscribingShown(): boolean {
    return this.transcribing;
  }

  async start(): Promise<void> {
    if (this.unsubscribers.length > 0) return;
    await this.sink.setHandIcon(true, this.icons.idleIcon(true));
    await this.sink.setHandIcon(false, this.icons.idleIcon(false));
    this.unsubscribers = [
      this.hub.ptt.subscribe((event) => this.onPttEvent(event), "IndicatorBridge"),
      this.hub.gestures.subscribe((event) => this.onGestureEvent(event), "IndicatorBridge"),
    ];
    this.logger.info("Indicator bridge started");
  }

  stop(): void {
    if (this.unsubscribers.length === 0) return;
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.logger.info("Indicator bridge stopped");
  }

  private async onPttEvent(event: PttEvent): Promise<void> {
    switch (event.type) {
      case PttEventType.RECORDING_STARTED:
        return;
      case PttEventType.RECORDING_STOPPED:
        this.transcribing = true;
        await this.sink.showTranscribing();
        return;
      case PttEventType.TRANSCRIPTION_COMPLETED:
      case PttEventType.TRANSCRIPTION_FAILED:
        // A start failure publishes FAILED without a preceding STOPPED
        if (!this.transcribing) return;
        this.transcribing = false;
        await this.sink.hideTranscribing();
        return;
      default: {
        const exhaustiveCheck: never = event;
        this.logger.warn(`Unhandled PTT event: ${JSON.stringify(exhaustiveCheck)}`);
      }
    }
  }

  private async onGestureEvent(event: GestureEvent): Promise<void> {
    const icon = this.icons.iconFor(event.gestureType, event.isConfirmed, event.isLeftHand);
    await this.sink.setHandIcon(event.isLeftHand, icon);
  }
}
