// Notification Hub
// In-process fan-out of PTT lifecycle and gesture events to any number of
// listeners (indicator bridge, WebSocket clients, gesture trigger).
//
// Every subscriber owns a promise chain: its handler calls run one after the
// other in publish order, while publish() itself returns immediately. A failing
// handler is logged and the chain moves on. The two channels are independent,
// so no ordering holds between a PTT event and a gesture event.

import type { GestureEvent, PttEvent } from "./types.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export type EventHandler<T> = (event: T) => void | Promise<void>;
export type Unsubscribe = () => void;

interface Subscription<T> {
  name: string;
  handler: EventHandler<T>;
  active: boolean;
  tail: Promise<void>;
}

export class EventChannel<T> {
  private readonly subscriptions = new Map<number, Subscription<T>>();
  private nextId = 1;
  readonly name: string;
  private readonly logger: Logger;

  constructor(name: string, logger: Logger) {
    this.name = name;
    this.logger = logger;
  }

  subscribe(handler: EventHandler<T>, name?: string): Unsubscribe {
    const id = this.nextId++;
    const subscription: Subscription<T> = {
      name: name ?? `${this.name}#${id}`,
      handler,
      active: true,
      tail: Promise.resolve(),
    };
    this.subscriptions.set(id, subscription);
    this.logger.debug(`Subscribed ${subscription.name} to ${this.name}`);

    return () => {
      if (!subscription.active) return;
      subscription.active = false;
      this.subscriptions.delete(id);
      this.logger.debug(`Unsubscribed ${subscription.name} from ${this.name}`);
    };
  }

  publish(event: T): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.tail = subscription.tail.then(() => this.deliver(subscription, event));
    }
  }

  /** Resolves once every delivery queued so far (including ones queued meanwhile) has run. */
  async drain(): Promise<void> {
    let pending = this.tails();
    for (;;) {
      await Promise.all(pending);
      const next = this.tails();
      if (next.length === pending.length && next.every((tail, i) => tail === pending[i])) return;
      pending = next;
    }
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  private tails(): Promise<void>[] {
    return [...this.subscriptions.values()].map((s) => s.tail);
  }

  private async deliver(subscription: Subscription<T>, event: T): Promise<void> {
    if (!subscription.active) return;
    try {
      await subscription.handler(event);
    } catch (err) {
      this.logger.warn(`Subscriber ${subscription.name} failed on ${this.name} event: ${errorMessage(err)}`);
    }
  }
}

export class NotificationHub {
  readonly ptt: EventChannel<PttEvent>;
  readonly gestures: EventChannel<GestureEvent>;

  constructor(logger: Logger = createLogger("NotificationHub")) {
    this.ptt = new EventChannel<PttEvent>("ptt", logger);
    this.gestures = new EventChannel<GestureEvent>("gestures", logger);
  }

  async drain(): Promise<void> {
    await Promise.all([this.ptt.drain(), this.gestures.drain()]);
  }
}
