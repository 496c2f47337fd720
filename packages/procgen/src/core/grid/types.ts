/**
 * Grid types for area generation.
 */

import type { Dimensions, Point } from "../geometry/types";

/**
 * Tile values stored in a grid.
 * DOOR is reserved: no generator emits it yet.
 */
export const TileType = {
  FLOOR: 0,
  WALL: 1,
  DOOR: 2,
} as const;

export type TileType = (typeof TileType)[keyof typeof TileType];

/**
 * Sentinel returned by bounds-checked lookups outside the grid
 */
export const OUT_OF_BOUNDS = -1;

export type TileLookup = TileType | typeof OUT_OF_BOUNDS;

export function isTileType(value: number): value is TileType {
  return (
    value === TileType.FLOOR ||
    value === TileType.WALL ||
    value === TileType.DOOR
  );
}

/**
 * Tiles a walker can stand on
 */
export function isPassable(tile: TileLookup): boolean {
  return tile === TileType.FLOOR || tile === TileType.DOOR;
}

/**
 * Region represents a connected area in the grid.
 * Points are stored in packed format (y << 16 | x).
 */
export interface Region {
  readonly id: number;
  /** Packed coordinates in discovery order: (y << 16) | x */
  readonly packedPoints: Uint32Array;
  /** First cell of the region in row-major order */
  readonly origin: Point;
  readonly size: number;
}

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface.
 *
 * Use this type when a function only needs to read from a grid.
 */
export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): TileLookup;
  countNeighbors8(x: number, y: number, targetType: TileType): number;
  countCells(tileType: TileType): number;
  getDimensions(): Dimensions;
  getRawDataCopy(): Uint8Array;
}

/**
 * Mutable grid interface. Passes mutate the grid in place.
 */
export interface MutableGrid extends ReadonlyGrid {
  set(x: number, y: number, value: TileType): void;
  setAt(p: Point, value: TileType): void;
  fillRect(
    x: number,
    y: number,
    width: number,
    height: number,
    value: TileType,
  ): void;
}
