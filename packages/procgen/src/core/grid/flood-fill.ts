/**
 * Flood fill algorithms for region detection and connectivity.
 */

import type { Point } from "../geometry/types";
import { DIRECTIONS_4 } from "../geometry/types";
import { isPassable, type ReadonlyGrid, type Region, type TileType } from "./types";

// ============================================================================
// Packed Coordinate Utilities
// ============================================================================

/**
 * Pack x,y coordinates into a single number.
 * Format: (y << 16) | x - supports coordinates up to 65535.
 */
export function packCoord(x: number, y: number): number {
  return ((y << 16) | x) >>> 0;
}

export function unpackToPoint(packed: number): Point {
  return { x: packed & 0xffff, y: packed >>> 16 };
}

/**
 * Convert a region's packed coordinates to points
 */
export function regionGetPoints(region: Region): Point[] {
  return Array.from(region.packedPoints, unpackToPoint);
}

// ============================================================================
// Flood Fill
// ============================================================================

/**
 * Breadth-first 4-way fill from (startX, startY) over cells accepted by
 * `matches`. Visited cells are marked in `visited` (one byte per cell).
 */
function fillFrom(
  grid: ReadonlyGrid,
  startX: number,
  startY: number,
  matches: (x: number, y: number) => boolean,
  visited: Uint8Array,
): number[] {
  const startIndex = startY * grid.width + startX;
  if (!grid.isInBounds(startX, startY)) return [];
  if (visited[startIndex] === 1 || !matches(startX, startY)) return [];

  const cells: number[] = [packCoord(startX, startY)];
  visited[startIndex] = 1;

  for (let head = 0; head < cells.length; head++) {
    const packed = cells[head] ?? 0;
    const x = packed & 0xffff;
    const y = packed >>> 16;

    for (const dir of DIRECTIONS_4) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (!grid.isInBounds(nx, ny)) continue;
      const index = ny * grid.width + nx;
      if (visited[index] === 1 || !matches(nx, ny)) continue;
      visited[index] = 1;
      cells.push(packCoord(nx, ny));
    }
  }

  return cells;
}

/**
 * Collect the 4-connected region of `targetValue` cells containing the start.
 */
export function floodFill(
  grid: ReadonlyGrid,
  startX: number,
  startY: number,
  targetValue: TileType,
): Point[] {
  const visited = new Uint8Array(grid.width * grid.height);
  return fillFrom(
    grid,
    startX,
    startY,
    (x, y) => grid.get(x, y) === targetValue,
    visited,
  ).map(unpackToPoint);
}

/**
 * Find all 4-connected regions of `targetValue`.
 * Regions are returned in row-major order of their first cell.
 */
export function findRegions(grid: ReadonlyGrid, targetValue: TileType): Region[] {
  const visited = new Uint8Array(grid.width * grid.height);
  const matches = (x: number, y: number): boolean =>
    grid.get(x, y) === targetValue;
  const regions: Region[] = [];

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const cells = fillFrom(grid, x, y, matches, visited);
      if (cells.length === 0) continue;

      regions.push({
        id: regions.length,
        packedPoints: Uint32Array.from(cells),
        origin: { x, y },
        size: cells.length,
      });
    }
  }

  return regions;
}

/**
 * Largest region. Ties keep the region found first in row-major order,
 * i.e. the one containing the lowest coordinate.
 */
export function largestRegion(regions: readonly Region[]): Region | undefined {
  let best: Region | undefined;
  for (const region of regions) {
    if (!best || region.size > best.size) {
      best = region;
    }
  }
  return best;
}

/**
 * Mark every passable cell reachable from `start` with 4-way moves.
 * Returns one byte per cell (1 = reachable).
 */
export function reachableFrom(grid: ReadonlyGrid, start: Point): Uint8Array {
  const visited = new Uint8Array(grid.width * grid.height);
  fillFrom(
    grid,
    start.x,
    start.y,
    (x, y) => isPassable(grid.get(x, y)),
    visited,
  );
  return visited;
}
