import { describe, it, expect, vi } from "vitest";
import { IndicatorBridge, LoggingIndicatorSink, type IndicatorSink } from "./indicator-bridge.js";
import { NotificationHub } from "./notification-hub.js";
import { GestureType, PttEventType, TriggerSource, type GestureEvent } from "./types.js";

function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Records every call as a short string. */
class RecordingSink implements IndicatorSink {
  readonly calls: string[] = [];

  showTranscribing(): void {
    this.calls.push("show");
  }

  hideTranscribing(): void {
    this.calls.push("hide");
  }

  setHandIcon(isLeftHand: boolean, icon: string): void {
    this.calls.push(`${isLeftHand ? "L" : "R"}:${icon}`);
  }
}

function gesture(gestureType: GestureType, isConfirmed: boolean, isLeftHand = false): GestureEvent {
  return { gestureType, isConfirmed, isLeftHand, confidence: 0.9, extendedFingers: 0, timestamp: 0 };
}

async function startBridge() {
  const hub = new NotificationHub(createSilentLogger());
  const sink = new RecordingSink();
  const bridge = new IndicatorBridge(hub, sink, undefined, createSilentLogger());
  await bridge.start();
  return { hub, sink, bridge };
}

describe("IndicatorBridge", () => {
  it("shows idle icons for both hands on start", async () => {
    const { sink } = await startBridge();
    expect(sink.calls).toEqual(["L:left-mouse", "R:right-mouse"]);
  });

  it("shows the transcribing indicator from STOPPED until the outcome", async () => {
    const { hub, sink, bridge } = await startBridge();
    sink.calls.length = 0;

    hub.ptt.publish({ type: PttEventType.RECORDING_STARTED, source: TriggerSource.KEYBOARD, timestamp: 0 });
    hub.ptt.publish({ type: PttEventType.RECORDING_STOPPED, durationMs: 1200, timestamp: 1200 });
    await hub.drain();
    expect(sink.calls).toEqual(["show"]);
    expect(bridge.isTranscribingShown).toBe(true);

    hub.ptt.publish({ type: PttEventType.TRANSCRIPTION_COMPLETED, text: "hello", timestamp: 2000 });
    await hub.drain();
    expect(sink.calls).toEqual(["show", "hide"]);
    expect(bridge.isTranscribingShown).toBe(false);
  });

  it("hides the indicator on failure", async () => {
    const { hub, sink } = await startBridge();
    sink.calls.length = 0;

    hub.ptt.publish({ type: PttEventType.RECORDING_STOPPED, durationMs: 10, timestamp: 10 });
    hub.ptt.publish({ type: PttEventType.TRANSCRIPTION_FAILED, message: "boom", timestamp: 20 });
    await hub.drain();

    expect(sink.calls).toEqual(["show", "hide"]);
  });

  it("does not hide an indicator that was never shown", async () => {
    const { hub, sink } = await startBridge();
    sink.calls.length = 0;

    hub.ptt.publish({ type: PttEventType.TRANSCRIPTION_FAILED, message: "no microphone", timestamp: 0 });
    await hub.drain();

    expect(sink.calls).toEqual([]);
  });

  it("updates the hand icon for every gesture event", async () => {
    const { hub, sink } = await startBridge();
    sink.calls.length = 0;

    hub.gestures.publish(gesture(GestureType.OPEN_PALM, false));
    hub.gestures.publish(gesture(GestureType.OPEN_PALM, true));
    hub.gestures.publish(gesture(GestureType.FIST, false, true));
    await hub.drain();

    expect(sink.calls).toEqual(["R:stop-right-hand", "R:stop-orange-right-hand", "L:fist-left-hand"]);
  });

  it("ignores events after stop", async () => {
    const { hub, sink, bridge } = await startBridge();
    sink.calls.length = 0;
    bridge.stop();

    hub.gestures.publish(gesture(GestureType.OK, true));
    hub.ptt.publish({ type: PttEventType.RECORDING_STOPPED, durationMs: 10, timestamp: 10 });
    await hub.drain();

    expect(sink.calls).toEqual([]);
    expect(hub.ptt.subscriberCount).toBe(0);
  });
});

describe("LoggingIndicatorSink", () => {
  it("logs an icon change once per hand", () => {
    const logger = createSilentLogger();
    const sink = new LoggingIndicatorSink(logger);

    sink.setHandIcon(true, "ok-left-hand");
    sink.setHandIcon(true, "ok-left-hand");
    sink.setHandIcon(false, "ok-left-hand");

    expect(logger.debug).toHaveBeenCalledTimes(2);
    expect(logger.debug).toHaveBeenCalledWith("left hand icon → ok-left-hand");
  });
});
