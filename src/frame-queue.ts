/**
 * Bounded frame queue with backpressure drop policy.
 * Uses a circular buffer for O(1) enqueue/dequeue regardless of queue state.
 * When the consumer falls behind, the oldest frame is dropped so the gesture
 * loop always works on recent hand poses.
 */

export class FrameQueue<T> {
  private buffer: (T | null)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private droppedByBackpressure: number;

  constructor(maxSize: number = 5) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`Invalid queue size: ${maxSize}. Must be a positive integer.`);
    }
    this.maxSize = maxSize;
    this.buffer = new Array<T | null>(maxSize).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.droppedByBackpressure = 0;
  }

  /** Enqueue a frame. If the queue is full, the oldest frame is dropped first. */
  enqueue(frame: T): void {
    if (this.count === this.maxSize) {
      this.droppedByBackpressure++;
      this.buffer[this.head] = null; // release reference to oldest
      this.head = (this.head + 1) % this.maxSize;
      this.count--;
    }

    this.buffer[this.tail] = frame;
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
  }

  /** Dequeue the next frame (FIFO), or null if empty. */
  dequeue(): T | null {
    if (this.count === 0) {
      return null;
    }

    const frame = this.buffer[this.head];
    this.buffer[this.head] = null;
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    return frame ?? null;
  }

  get framesDroppedByBackpressure(): number {
    return this.droppedByBackpressure;
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.buffer.fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
