// Gesture Trigger
// Maps confirmed gestures to session commands through a binding table, e.g.
// GESTURE_BINDINGS="ok:toggle,open_palm:stop". Pending events never trigger.
// With no bindings the adapter is inert and gestures only drive the indicator.

import { GestureType, TriggerSource } from "./types.js";
import type { CommandResult, GestureEvent, TriggerKind } from "./types.js";
import type { NotificationHub, Unsubscribe } from "./notification-hub.js";
import { createCommand, type SessionOrchestrator } from "./session-orchestrator.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export type GestureBindings = ReadonlyMap<GestureType, TriggerKind>;

const TRIGGER_KINDS: readonly TriggerKind[] = ["start", "stop", "toggle"];

function isGestureType(value: string): value is GestureType {
  return Object.values(GestureType).some((g) => g === value);
}

function isTriggerKind(value: string): value is TriggerKind {
  return TRIGGER_KINDS.some((k) => k === value);
}

/**
 * Parses "gesture:kind" pairs separated by commas. Blank input yields no bindings.
 * @throws Error listing every invalid pair.
 */
export function parseGestureBindings(spec: string): Map<GestureType, TriggerKind> {
  const bindings = new Map<GestureType, TriggerKind>();
  const problems: string[] = [];

  for (const raw of spec.split(",")) {
    const pair = raw.trim();
    if (pair.length === 0) continue;

    const [gesture = "", kind = "", ...rest] = pair.split(":").map((part) => part.trim().toLowerCase());
    if (rest.length > 0 || !isGestureType(gesture) || !isTriggerKind(kind)) {
      problems.push(`"${pair}"`);
      continue;
    }
    if (gesture === GestureType.NONE) {
      problems.push(`"${pair}" (none cannot be bound)`);
      continue;
    }
    if (bindings.has(gesture)) {
      problems.push(`"${pair}" (${gesture} bound twice)`);
      continue;
    }
    bindings.set(gesture, kind);
  }

  if (problems.length > 0) {
    throw new Error(`Invalid gesture bindings: ${problems.join(", ")}`);
  }
  return bindings;
}

export class GestureTrigger {
  private readonly hub: NotificationHub;
  private readonly orchestrator: SessionOrchestrator;
  private readonly bindings: GestureBindings;
  private readonly logger: Logger;
  private unsubscribe: Unsubscribe | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    hub: NotificationHub,
    orchestrator: SessionOrchestrator,
    bindings: GestureBindings,
    logger: Logger = createLogger("GestureTrigger"),
  ) {
    this.hub = hub;
    this.orchestrator = orchestrator;
    this.bindings = bindings;
    this.logger = logger;
  }

  get enabled(): boolean {
    return this.bindings.size > 0;
  }

  start(): void {
    if (this.unsubscribe) return;
    if (!this.enabled) {
      this.logger.info("No gesture bindings configured; gestures will not trigger dictation");
      return;
    }
    // The handler returns before the command settles; the hub delivers events to a
    // subscriber one after another, so awaiting here would queue gestures.
    this.unsubscribe = this.hub.gestures.subscribe((event) => {
      this.dispatch(event);
    }, "GestureTrigger");
    const summary = [...this.bindings].map(([gesture, kind]) => `${gesture}→${kind}`).join(", ");
    this.logger.info(`Gesture trigger active (${summary})`);
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Resolves once every gesture command started so far has settled. */
  async idle(): Promise<void> {
    await Promise.all(this.inFlight);
  }

  private dispatch(event: GestureEvent): void {
    const handled = this.onGesture(event)
      .then(() => undefined)
      .catch((err: unknown) => {
        this.logger.error(`Gesture ${event.gestureType} failed: ${errorMessage(err)}`);
      })
      .finally(() => this.inFlight.delete(handled));
    this.inFlight.add(handled);
  }

  /** Returns the command result, or null when the event is not bound. */
  async onGesture(event: GestureEvent): Promise<CommandResult | null> {
    if (!event.isConfirmed) return null;
    const kind = this.bindings.get(event.gestureType);
    if (!kind) return null;

    const result = await this.orchestrator.execute(createCommand(kind, TriggerSource.GESTURE));
    this.logger.debug(
      `Gesture ${event.gestureType} → ${kind}: ${result.occurred ? "accepted" : `rejected (${result.rejection})`}`,
    );
    return result;
  }
}
