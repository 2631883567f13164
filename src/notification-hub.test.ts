import { describe, it, expect, vi } from "vitest";
import { EventChannel, NotificationHub } from "./notification-hub.js";
import { createDeferred } from "./utils/deferred.js";
import { GestureType, PttEventType, TriggerSource, type PttEvent } from "./types.js";

function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe("EventChannel", () => {
  it("delivers every event to every subscriber in publish order", async () => {
    const channel = new EventChannel<number>("numbers", createSilentLogger());
    const a: number[] = [];
    const b: number[] = [];
    channel.subscribe((n) => {
      a.push(n);
    });
    channel.subscribe((n) => {
      b.push(n);
    });

    channel.publish(1);
    channel.publish(2);
    channel.publish(3);
    await channel.drain();

    expect(a).toEqual([1, 2, 3]);
    expect(b).toEqual([1, 2, 3]);
  });

  it("returns from publish before handlers run", async () => {
    const channel = new EventChannel<number>("numbers", createSilentLogger());
    const seen: number[] = [];
    channel.subscribe((n) => {
      seen.push(n);
    });

    channel.publish(1);
    expect(seen).toEqual([]);
    await channel.drain();
    expect(seen).toEqual([1]);
  });

  it("runs one subscriber's async handlers one at a time", async () => {
    const channel = new EventChannel<string>("letters", createSilentLogger());
    const gate = createDeferred<void>();
    const log: string[] = [];
    channel.subscribe(async (letter) => {
      log.push(`start ${letter}`);
      if (letter === "a") await gate.promise;
      log.push(`end ${letter}`);
    });

    channel.publish("a");
    channel.publish("b");
    await new Promise((resolve) => setImmediate(resolve));
    expect(log).toEqual(["start a"]);

    gate.resolve();
    await channel.drain();
    expect(log).toEqual(["start a", "end a", "start b", "end b"]);
  });

  it("does not let a slow subscriber hold up another", async () => {
    const channel = new EventChannel<number>("numbers", createSilentLogger());
    const gate = createDeferred<void>();
    const fast: number[] = [];
    channel.subscribe(() => gate.promise);
    channel.subscribe((n) => {
      fast.push(n);
    });

    channel.publish(1);
    channel.publish(2);
    await new Promise((resolve) => setImmediate(resolve));
    expect(fast).toEqual([1, 2]);

    gate.resolve();
    await channel.drain();
  });

  it("logs a failing handler and keeps delivering", async () => {
    const logger = createSilentLogger();
    const channel = new EventChannel<number>("numbers", logger);
    const seen: number[] = [];
    channel.subscribe(
      (n) => {
        if (n === 1) throw new Error("boom");
        seen.push(n);
      },
      "flaky",
    );
    channel.subscribe(async (n) => {
      if (n === 2) throw new Error("async boom");
    }, "async-flaky");

    channel.publish(1);
    channel.publish(2);
    channel.publish(3);
    await channel.drain();

    expect(seen).toEqual([2, 3]);
    expect(logger.warn).toHaveBeenCalledWith("Subscriber flaky failed on numbers event: boom");
    expect(logger.warn).toHaveBeenCalledWith("Subscriber async-flaky failed on numbers event: async boom");
  });

  it("stops delivering queued events after unsubscribe", async () => {
    const channel = new EventChannel<number>("numbers", createSilentLogger());
    const seen: number[] = [];
    const unsubscribe = channel.subscribe((n) => {
      seen.push(n);
    });

    channel.publish(1);
    channel.publish(2);
    unsubscribe();
    unsubscribe();
    await channel.drain();
    await new Promise((resolve) => setImmediate(resolve));

    expect(seen).toEqual([]);
    expect(channel.subscriberCount).toBe(0);
  });

  it("waits in drain for events published by a handler", async () => {
    const channel = new EventChannel<number>("numbers", createSilentLogger());
    const seen: number[] = [];
    channel.subscribe((n) => {
      seen.push(n);
      if (n < 3) channel.publish(n + 1);
    });

    channel.publish(1);
    await channel.drain();
    expect(seen).toEqual([1, 2, 3]);
  });
});

describe("NotificationHub", () => {
  it("keeps the PTT and gesture channels separate", async () => {
    const hub = new NotificationHub(createSilentLogger());
    const ptt: PttEvent[] = [];
    const gestures: GestureType[] = [];
    hub.ptt.subscribe((event) => {
      ptt.push(event);
    });
    hub.gestures.subscribe((event) => {
      gestures.push(event.gestureType);
    });

    hub.ptt.publish({ type: PttEventType.RECORDING_STARTED, source: TriggerSource.KEYBOARD, timestamp: 1 });
    hub.gestures.publish({
      gestureType: GestureType.FIST,
      isLeftHand: false,
      confidence: 1,
      extendedFingers: 0,
      isConfirmed: true,
      timestamp: 2,
    });
    await hub.drain();

    expect(ptt).toEqual([{ type: PttEventType.RECORDING_STARTED, source: TriggerSource.KEYBOARD, timestamp: 1 }]);
    expect(gestures).toEqual([GestureType.FIST]);
  });
});
