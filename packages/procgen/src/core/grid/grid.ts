/**
 * Tile grid backed by a flat Uint8Array.
 */

import { DIRECTIONS_8, type Dimensions, type Point } from "../geometry/types";
import {
  isTileType,
  type MutableGrid,
  OUT_OF_BOUNDS,
  type TileLookup,
  TileType,
} from "./types";

/**
 * 2D grid with bounds-checked cell access and neighbor counting.
 *
 * @remarks
 * The grid is internally mutable: passes carve into it in place rather than
 * copying. Hand out `ReadonlyGrid` where callers only need to look.
 */
export class Grid implements MutableGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(
    width: number,
    height: number,
    initialValue: TileType = TileType.WALL,
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);
    this.data.fill(initialValue);
  }

  /**
   * Create grid filled with walls
   */
  static walls(width: number, height: number): Grid {
    return new Grid(width, height, TileType.WALL);
  }

  /**
   * Create a grid from row-major tile values.
   * Unknown values and missing trailing cells become walls.
   */
  static fromTiles(
    width: number,
    height: number,
    tiles: ArrayLike<number>,
  ): Grid {
    const grid = Grid.walls(width, height);
    const count = Math.min(width * height, tiles.length);
    for (let i = 0; i < count; i++) {
      const value = tiles[i];
      if (value !== undefined && isTileType(value)) {
        grid.data[i] = value;
      }
    }
    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Get cell value, or OUT_OF_BOUNDS outside the grid. Never throws.
   */
  get(x: number, y: number): TileLookup {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return OUT_OF_BOUNDS;
    if (!this.isInBounds(x, y)) return OUT_OF_BOUNDS;
    const value = this.data[y * this.width + x];
    return value !== undefined && isTileType(value) ? value : TileType.WALL;
  }

  getAt(p: Point): TileLookup {
    return this.get(p.x, p.y);
  }

  /**
   * Set cell value. Writes outside the grid are ignored.
   */
  set(x: number, y: number, value: TileType): void {
    if (!this.isInBounds(x, y)) return;
    this.data[y * this.width + x] = value;
  }

  setAt(p: Point, value: TileType): void {
    this.set(p.x, p.y, value);
  }

  /**
   * Fill a rectangle, clipped to the grid
   */
  fillRect(
    x: number,
    y: number,
    width: number,
    height: number,
    value: TileType,
  ): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.width, x + width);
    const y1 = Math.min(this.height, y + height);

    for (let cy = y0; cy < y1; cy++) {
      this.data.fill(value, cy * this.width + x0, cy * this.width + x1);
    }
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * Count the 8 neighbors equal to `targetType`.
   * Out-of-bounds neighbors count as WALL.
   */
  countNeighbors8(x: number, y: number, targetType: TileType): number {
    let count = 0;
    for (const dir of DIRECTIONS_8) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      const cell = this.isInBounds(nx, ny)
        ? this.get(nx, ny)
        : TileType.WALL;
      if (cell === targetType) count++;
    }
    return count;
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  countCells(tileType: TileType): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === tileType) count++;
    }
    return count;
  }

  getDimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  /**
   * Copy of the row-major tile values
   */
  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  clone(): Grid {
    return Grid.fromTiles(this.width, this.height, this.data);
  }
}
