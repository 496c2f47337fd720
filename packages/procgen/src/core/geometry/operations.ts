/**
 * Pure geometry helpers shared by the layout generators.
 */

import type { Dimensions, Point, Rect } from "./types";

// =============================================================================
// POINT OPERATIONS
// =============================================================================

/**
 * Manhattan distance between two points
 */
export function manhattanDistance(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

// =============================================================================
// RECT OPERATIONS
// =============================================================================

export function rect(
  x: number,
  y: number,
  width: number,
  height: number,
): Rect {
  return { x, y, width, height };
}

/**
 * Center tile of a rect, halves rounded down
 */
export function rectCenter(r: Rect): Point {
  return {
    x: r.x + Math.floor(r.width / 2),
    y: r.y + Math.floor(r.height / 2),
  };
}

export function rectArea(r: Rect): number {
  return r.width * r.height;
}

/**
 * Check if a point is inside a rect
 */
export function rectContainsPoint(r: Rect, p: Point): boolean {
  return (
    p.x >= r.x && p.x < r.x + r.width && p.y >= r.y && p.y < r.y + r.height
  );
}

/**
 * Check if two rects overlap (half-open intervals)
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return (
    a.x < b.x + b.width &&
    a.x + a.width > b.x &&
    a.y < b.y + b.height &&
    a.y + a.height > b.y
  );
}

/**
 * Check if two rects overlap once each is grown by `padding` on every side.
 * Two rooms separated by fewer than `2 * padding` wall tiles intersect.
 */
export function rectsOverlapWithPadding(
  a: Rect,
  b: Rect,
  padding: number,
): boolean {
  return (
    a.x - padding < b.x + b.width + padding &&
    a.x + a.width + padding > b.x - padding &&
    a.y - padding < b.y + b.height + padding &&
    a.y + a.height + padding > b.y - padding
  );
}

/**
 * Check that a rect lies entirely inside a grid of the given size
 */
export function rectFitsIn(r: Rect, dims: Dimensions): boolean {
  return (
    r.x >= 0 &&
    r.y >= 0 &&
    r.width > 0 &&
    r.height > 0 &&
    r.x + r.width <= dims.width &&
    r.y + r.height <= dims.height
  );
}
