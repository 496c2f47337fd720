/**
 * Padded room intersection.
 */

import { rectsOverlapWithPadding } from "../../core/geometry/operations";
import type { Rect } from "../../core/geometry/types";

/**
 * True when `a` and `b` overlap after each is grown by `padding` tiles on
 * every side.
 */
export function roomsIntersect(a: Rect, b: Rect, padding: number): boolean {
  return rectsOverlapWithPadding(a, b, padding);
}

/**
 * True when `candidate` intersects any of `placed`
 */
export function intersectsAny(
  candidate: Rect,
  placed: readonly Rect[],
  padding: number,
): boolean {
  return placed.some((other) => roomsIntersect(candidate, other, padding));
}
