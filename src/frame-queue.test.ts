import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { FrameQueue } from "./frame-queue.js";
import type { HandFrame } from "./types.js";

function emptyFrame(timestamp: number): HandFrame {
  return { hand: null, timestamp };
}

describe("FrameQueue", () => {
  describe("FIFO behavior", () => {
    it("dequeues frames in the order they were enqueued", () => {
      const q = new FrameQueue<HandFrame>(5);
      q.enqueue(emptyFrame(0));
      q.enqueue(emptyFrame(1));
      q.enqueue(emptyFrame(2));

      expect(q.dequeue()?.timestamp).toBe(0);
      expect(q.dequeue()?.timestamp).toBe(1);
      expect(q.dequeue()?.timestamp).toBe(2);
    });

    it("returns null when empty", () => {
      const q = new FrameQueue<number>();
      expect(q.dequeue()).toBeNull();
      q.enqueue(1);
      q.dequeue();
      expect(q.dequeue()).toBeNull();
    });

    it("tracks its size", () => {
      const q = new FrameQueue<number>(3);
      expect(q.size).toBe(0);
      q.enqueue(1);
      q.enqueue(2);
      expect(q.size).toBe(2);
      q.dequeue();
      expect(q.size).toBe(1);
    });
  });

  describe("backpressure", () => {
    it("drops the oldest frame when full", () => {
      const q = new FrameQueue<number>(2);
      q.enqueue(1);
      q.enqueue(2);
      q.enqueue(3);

      expect(q.framesDroppedByBackpressure).toBe(1);
      expect(q.size).toBe(2);
      expect(q.dequeue()).toBe(2);
      expect(q.dequeue()).toBe(3);
    });

    it("keeps working after the buffer wraps around", () => {
      const q = new FrameQueue<number>(3);
      for (let i = 0; i < 10; i++) q.enqueue(i);

      expect(q.framesDroppedByBackpressure).toBe(7);
      expect([q.dequeue(), q.dequeue(), q.dequeue()]).toEqual([7, 8, 9]);
    });

    it("always holds the newest min(n, maxSize) values", () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 8 }), fc.array(fc.integer(), { maxLength: 40 }), (maxSize, values) => {
          const q = new FrameQueue<number>(maxSize);
          for (const v of values) q.enqueue(v);

          const drained: number[] = [];
          for (let next = q.dequeue(); next !== null; next = q.dequeue()) drained.push(next);

          expect(drained).toEqual(values.slice(Math.max(0, values.length - maxSize)));
          expect(q.framesDroppedByBackpressure).toBe(Math.max(0, values.length - maxSize));
        }),
      );
    });
  });

  describe("clear", () => {
    it("empties the queue without touching the drop counter", () => {
      const q = new FrameQueue<number>(1);
      q.enqueue(1);
      q.enqueue(2);
      q.clear();

      expect(q.size).toBe(0);
      expect(q.dequeue()).toBeNull();
      expect(q.framesDroppedByBackpressure).toBe(1);
    });
  });

  describe("validation", () => {
    it.each([0, -1, 1.5, Number.NaN])("rejects a size of %s", (size) => {
      expect(() => new FrameQueue<number>(size)).toThrow(`Invalid queue size: ${size}. Must be a positive integer.`);
    });
  });
});
