// Gesture → indicator icon lookup.
// Every (gestureType, confirmed, hand) combination has an explicit entry; the
// table refuses to build when one is missing.

import { GestureType } from "./types.js";

export type HandSide = "left" | "right";

export type GestureIconKey = `${GestureType}:${"pending" | "confirmed"}:${HandSide}`;

export type GestureIconEntries = Record<GestureType, Record<"pending" | "confirmed", Record<HandSide, string>>>;

const HAND_SIDES: readonly HandSide[] = ["left", "right"];
const STATUSES = ["pending", "confirmed"] as const;

/** Icon base name per gesture; null means "no gesture" and falls back to the placeholder. */
const ICON_BASE_NAMES: Record<GestureType, string | null> = {
  [GestureType.NONE]: null,
  [GestureType.FIST]: "fist",
  [GestureType.POINTING_UP]: "point",
  [GestureType.VICTORY]: "victory",
  [GestureType.OPEN_PALM]: "stop",
  [GestureType.OK]: "ok",
};

function placeholderIcon(side: HandSide): string {
  return `${side}-mouse`;
}

function defaultIcon(gesture: GestureType, confirmed: boolean, side: HandSide): string {
  const base = ICON_BASE_NAMES[gesture];
  if (base === null) return placeholderIcon(side);
  return `${base}-${confirmed ? "orange-" : ""}${side}-hand`;
}

/** Builds the shipped icon set: `{base}-[orange-]{left|right}-hand`, `{left|right}-mouse` for no gesture. */
export function defaultGestureIconEntries(): GestureIconEntries {
  const build = (gesture: GestureType) => ({
    pending: { left: defaultIcon(gesture, false, "left"), right: defaultIcon(gesture, false, "right") },
    confirmed: { left: defaultIcon(gesture, true, "left"), right: defaultIcon(gesture, true, "right") },
  });
  return {
    [GestureType.NONE]: build(GestureType.NONE),
    [GestureType.FIST]: build(GestureType.FIST),
    [GestureType.POINTING_UP]: build(GestureType.POINTING_UP),
    [GestureType.VICTORY]: build(GestureType.VICTORY),
    [GestureType.OPEN_PALM]: build(GestureType.OPEN_PALM),
    [GestureType.OK]: build(GestureType.OK),
  };
}

export class GestureIconTable {
  private readonly icons = new Map<GestureIconKey, string>();

  /**
   * @throws Error naming every combination without a non-empty icon id.
   */
  constructor(entries: GestureIconEntries = defaultGestureIconEntries()) {
    const missing: string[] = [];

    for (const gesture of Object.values(GestureType)) {
      for (const status of STATUSES) {
        for (const side of HAND_SIDES) {
          const key: GestureIconKey = `${gesture}:${status}:${side}`;
          const icon = entries[gesture]?.[status]?.[side];
          if (typeof icon !== "string" || icon.trim().length === 0) {
            missing.push(key);
            continue;
          }
          this.icons.set(key, icon);
        }
      }
    }

    if (missing.length > 0) {
      throw new Error(`Gesture icon table is incomplete, missing: ${missing.join(", ")}`);
    }
  }

  iconFor(gesture: GestureType, confirmed: boolean, isLeftHand: boolean): string {
    const key: GestureIconKey = `${gesture}:${confirmed ? "confirmed" : "pending"}:${isLeftHand ? "left" : "right"}`;
    const icon = this.icons.get(key);
    if (icon === undefined) {
      // Unreachable for a GestureType value; construction checked every key
      throw new Error(`No icon for ${key}`);
    }
    return icon;
  }

  /** Icon shown before any gesture has been seen. */
  idleIcon(isLeftHand: boolean): string {
    return this.iconFor(GestureType.NONE, false, isLeftHand);
  }

  get size(): number {
    return this.icons.size;
  }
}
