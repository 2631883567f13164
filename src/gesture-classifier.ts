// Gesture Classifier
// Pure mapping from one hand's 21 landmarks to a raw gesture label.
//
// Coordinates are normalized to 0..1 with the origin at the top-left of the
// (mirrored) camera image, so "above" means a smaller y value.

import { GestureType } from "./types.js";
import type { GestureSample, HandLandmarks, Point3D } from "./types.js";

/** MediaPipe hand landmark indices. */
export const Landmark = {
  WRIST: 0,
  THUMB_CMC: 1,
  THUMB_MCP: 2,
  THUMB_IP: 3,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_PIP: 6,
  INDEX_DIP: 7,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_PIP: 10,
  MIDDLE_DIP: 11,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_PIP: 14,
  RING_DIP: 15,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_PIP: 18,
  PINKY_DIP: 19,
  PINKY_TIP: 20,
} as const;

export const LANDMARK_COUNT = 21;

/** Thumb-tip to index-tip distance below which the hand forms an OK circle. */
export const OK_GESTURE_MAX_DISTANCE = 0.05;

/**
 * Horizontal thumb-tip to thumb-IP offset above which the thumb counts as extended.
 * A folded thumb measures roughly 0.06-0.08, an extended one 0.10-0.13.
 */
export const THUMB_EXTENSION_MIN_OFFSET = 0.1;

/** Tip/PIP pairs for the four fingers tested by vertical position. */
const VERTICAL_FINGERS: ReadonlyArray<readonly [tip: number, pip: number]> = [
  [Landmark.INDEX_TIP, Landmark.INDEX_PIP],
  [Landmark.MIDDLE_TIP, Landmark.MIDDLE_PIP],
  [Landmark.RING_TIP, Landmark.RING_PIP],
  [Landmark.PINKY_TIP, Landmark.PINKY_PIP],
];

function point(landmarks: Point3D[], index: number): Point3D {
  const p = landmarks[index];
  if (!p) {
    throw new Error(`Missing hand landmark ${index}: expected ${LANDMARK_COUNT} landmarks, got ${landmarks.length}`);
  }
  return p;
}

function distance2D(a: Point3D, b: Point3D): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Thumb joints sit nearly on one line, so the thumb is tested horizontally;
 * every other finger is extended when its tip is above its PIP joint.
 */
export function extendedFingerFlags(landmarks: Point3D[]): boolean[] {
  const thumbOffset = Math.abs(point(landmarks, Landmark.THUMB_TIP).x - point(landmarks, Landmark.THUMB_IP).x);
  const flags = [thumbOffset > THUMB_EXTENSION_MIN_OFFSET];
  for (const [tip, pip] of VERTICAL_FINGERS) {
    flags.push(point(landmarks, tip).y < point(landmarks, pip).y);
  }
  return flags;
}

export function countExtendedFingers(landmarks: Point3D[]): number {
  return extendedFingerFlags(landmarks).filter(Boolean).length;
}

export function isOkGesture(landmarks: Point3D[]): boolean {
  return distance2D(point(landmarks, Landmark.THUMB_TIP), point(landmarks, Landmark.INDEX_TIP)) < OK_GESTURE_MAX_DISTANCE;
}

/**
 * Classifies by extended-finger count. The OK circle is checked first because
 * it is more specific than any count. Three or four fingers are ambiguous and
 * stay unclassified.
 */
export function classifyGesture(landmarks: Point3D[]): GestureType {
  if (isOkGesture(landmarks)) return GestureType.OK;

  switch (countExtendedFingers(landmarks)) {
    case 0:
      return GestureType.FIST;
    case 1:
      return GestureType.POINTING_UP;
    case 2:
      return GestureType.VICTORY;
    case 5:
      return GestureType.OPEN_PALM;
    default:
      return GestureType.NONE;
  }
}

export function toGestureSample(hand: HandLandmarks, timestamp: number): GestureSample {
  if (hand.landmarks.length !== LANDMARK_COUNT) {
    throw new Error(`Expected ${LANDMARK_COUNT} hand landmarks, got ${hand.landmarks.length}`);
  }
  return {
    label: classifyGesture(hand.landmarks),
    confidence: hand.score,
    isLeftHand: hand.isLeftHand,
    extendedFingerCount: countExtendedFingers(hand.landmarks),
    timestamp,
  };
}
