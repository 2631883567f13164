import { describe, it, expect, vi } from "vitest";
import { GestureTrigger, parseGestureBindings } from "./gesture-trigger.js";
import { SessionOrchestrator } from "./session-orchestrator.js";
import { NotificationHub } from "./notification-hub.js";
import { createDeferred } from "./utils/deferred.js";
import { GestureType, SessionState, TriggerSource, type Deferred, type GestureEvent } from "./types.js";

function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function gesture(gestureType: GestureType, isConfirmed = true): GestureEvent {
  return { gestureType, isConfirmed, isLeftHand: false, confidence: 1, extendedFingers: 0, timestamp: 0 };
}

function createHarness(bindings: string, startGate: Deferred<void> | null = null) {
  const hub = new NotificationHub(createSilentLogger());
  const startCapture = vi.fn(async () => {
    if (startGate) await startGate.promise;
    return { id: "capture-1" };
  });
  const orchestrator = new SessionOrchestrator({
    audioCapture: {
      startCapture,
      stopCapture: async () => ({ pcm: Buffer.alloc(32), sampleRate: 16000, channels: 1 }),
    },
    transcriber: { transcribe: async () => "hello" },
    typer: { type: async () => undefined },
    hub,
    logger: createSilentLogger(),
  });
  const logger = createSilentLogger();
  const trigger = new GestureTrigger(hub, orchestrator, parseGestureBindings(bindings), logger);
  return { hub, orchestrator, trigger, logger, startCapture };
}

describe("parseGestureBindings", () => {
  it("parses gesture:kind pairs", () => {
    const bindings = parseGestureBindings("ok:toggle, open_palm:stop,FIST:Start");

    expect([...bindings]).toEqual([
      [GestureType.OK, "toggle"],
      [GestureType.OPEN_PALM, "stop"],
      [GestureType.FIST, "start"],
    ]);
  });

  it("returns no bindings for blank input", () => {
    expect(parseGestureBindings("").size).toBe(0);
    expect(parseGestureBindings(" , ").size).toBe(0);
  });

  it("lists every invalid pair", () => {
    expect(() => parseGestureBindings("wave:toggle,ok:pause,ok")).toThrow(
      'Invalid gesture bindings: "wave:toggle", "ok:pause", "ok"',
    );
  });

  it("refuses to bind the no-gesture label", () => {
    expect(() => parseGestureBindings("none:toggle")).toThrow(
      'Invalid gesture bindings: "none:toggle" (none cannot be bound)',
    );
  });

  it("refuses to bind a gesture twice", () => {
    expect(() => parseGestureBindings("ok:start,ok:stop")).toThrow(
      'Invalid gesture bindings: "ok:stop" (ok bound twice)',
    );
  });
});

describe("GestureTrigger", () => {
  it("executes the bound command for a confirmed gesture", async () => {
    const { trigger, orchestrator } = createHarness("ok:toggle");

    const result = await trigger.onGesture(gesture(GestureType.OK));

    expect(result).toMatchObject({ kind: "toggle", source: TriggerSource.GESTURE, occurred: true });
    expect(orchestrator.state).toBe(SessionState.RECORDING);
  });

  it("ignores pending gestures", async () => {
    const { trigger, startCapture } = createHarness("ok:toggle");

    expect(await trigger.onGesture(gesture(GestureType.OK, false))).toBeNull();
    expect(startCapture).not.toHaveBeenCalled();
  });

  it("ignores unbound gestures", async () => {
    const { trigger, startCapture } = createHarness("ok:toggle");

    expect(await trigger.onGesture(gesture(GestureType.VICTORY))).toBeNull();
    expect(startCapture).not.toHaveBeenCalled();
  });

  it("passes rejections through", async () => {
    const { trigger } = createHarness("open_palm:stop");

    const result = await trigger.onGesture(gesture(GestureType.OPEN_PALM));
    expect(result).toMatchObject({ occurred: false, rejection: "not_recording" });
  });

  it("reacts to hub events once started", async () => {
    const { hub, trigger, orchestrator } = createHarness("fist:start");
    trigger.start();

    hub.gestures.publish(gesture(GestureType.FIST));
    await hub.drain();
    await trigger.idle();

    expect(orchestrator.state).toBe(SessionState.RECORDING);
    trigger.stop();
    expect(hub.gestures.subscriberCount).toBe(0);
  });

  it("rejects a second gesture while the first is still starting capture", async () => {
    const gate = createDeferred<void>();
    const { hub, trigger, orchestrator, startCapture } = createHarness("ok:toggle", gate);
    trigger.start();

    hub.gestures.publish(gesture(GestureType.OK));
    hub.gestures.publish(gesture(GestureType.OK));
    await hub.drain();
    gate.resolve();
    await trigger.idle();

    expect(orchestrator.state).toBe(SessionState.RECORDING);
    expect(startCapture).toHaveBeenCalledTimes(1);
    trigger.stop();
  });

  it("logs a command that throws", async () => {
    const { hub, trigger, orchestrator, logger } = createHarness("ok:toggle");
    vi.spyOn(orchestrator, "execute").mockRejectedValue(new Error("exploded"));
    trigger.start();

    hub.gestures.publish(gesture(GestureType.OK));
    await hub.drain();
    await trigger.idle();

    expect(logger.error).toHaveBeenCalledWith("Gesture ok failed: exploded");
    trigger.stop();
  });

  it("stays off the hub without bindings", () => {
    const { hub, trigger } = createHarness("");
    trigger.start();

    expect(trigger.enabled).toBe(false);
    expect(hub.gestures.subscriberCount).toBe(0);
  });
});
