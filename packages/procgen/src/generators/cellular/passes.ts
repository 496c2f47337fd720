/**
 * Cellular Automata Generator Passes
 */

import { DisconnectedMapError, type SeededRandom } from "@wyrmhold/contracts";
import { rectArea } from "../../core/geometry/operations";
import type { Point, Rect } from "../../core/geometry/types";
import { findRegions, largestRegion } from "../../core/grid/flood-fill";
import { Grid } from "../../core/grid/grid";
import { type ReadonlyGrid, type Region, TileType } from "../../core/grid/types";
import type { RoomShape } from "../../model/room";
import { intersectsAny } from "../../passes/validation/intersection";
import type { EmptyArtifact, LayoutArtifact, Pass } from "../../pipeline/types";
import {
  CELLULAR_CAVE_PASS,
  CELLULAR_ROOM_PADDING,
  CELLULAR_ROOMS_PASS,
  GROWTH_DIRECTIONS,
  type GrowthDirection,
} from "./constants";
import type { ResolvedCellularParams } from "./generator";

// =============================================================================
// ARTIFACTS
// =============================================================================

export interface CaveArtifact {
  readonly type: "cave";
  readonly grid: Grid;
  /** Size of the single connected cave left on the grid */
  readonly caveSize: number;
  /** Attempts used, 1 when the first automaton run was kept */
  readonly attempts: number;
}

// =============================================================================
// AUTOMATON
// =============================================================================

/**
 * Random fill in row-major order
 */
export function randomFill(
  width: number,
  height: number,
  fillProbability: number,
  rng: SeededRandom,
): Grid {
  const grid = Grid.walls(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (rng.nextFloat() < fillProbability) {
        grid.set(x, y, TileType.FLOOR);
      }
    }
  }
  return grid;
}

/**
 * One smoothing step into a fresh grid. A cell becomes floor when at least
 * `birthThreshold` of its 8 neighbors are floor; the map edge counts as wall.
 */
export function smoothStep(grid: ReadonlyGrid, birthThreshold: number): Grid {
  const next = Grid.walls(grid.width, grid.height);
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.countNeighbors8(x, y, TileType.FLOOR) >= birthThreshold) {
        next.set(x, y, TileType.FLOOR);
      }
    }
  }
  return next;
}

/**
 * Keep the largest floor region and wall off every other one.
 */
export function keepLargestRegion(grid: Grid): Region | undefined {
  const regions = findRegions(grid, TileType.FLOOR);
  const kept = largestRegion(regions);

  for (const region of regions) {
    if (region === kept) continue;
    for (const packed of region.packedPoints) {
      grid.set(packed & 0xffff, packed >>> 16, TileType.WALL);
    }
  }
  return kept;
}

/**
 * Fill, smooth and prune, retrying with derived sources until the kept cave
 * is large enough.
 *
 * @throws DisconnectedMapError once every retry is spent
 */
export function carveCave(
  params: ResolvedCellularParams,
): Pass<EmptyArtifact, CaveArtifact> {
  return {
    id: CELLULAR_CAVE_PASS,
    run(input, ctx) {
      const totalAttempts = params.maxRetries + 1;
      let largestSeen = 0;

      for (let attempt = 0; attempt < totalAttempts; attempt++) {
        const rng = attempt === 0 ? ctx.rng : ctx.rng.derive(attempt);

        let grid = randomFill(
          input.width,
          input.height,
          params.fillProbability,
          rng,
        );
        for (let i = 0; i < params.iterations; i++) {
          grid = smoothStep(grid, params.birthThreshold);
        }

        const kept = keepLargestRegion(grid);
        const caveSize = kept?.size ?? 0;
        largestSeen = Math.max(largestSeen, caveSize);

        if (kept && caveSize >= params.minPlayableArea) {
          ctx.trace.decision(CELLULAR_CAVE_PASS, {
            kind: "cave-kept",
            attempt,
            caveSize,
            minPlayableArea: params.minPlayableArea,
            origin: kept.origin,
          });
          return { type: "cave", grid, caveSize, attempts: attempt + 1 };
        }

        ctx.trace.warning(
          CELLULAR_CAVE_PASS,
          `Attempt ${attempt + 1}/${totalAttempts}: largest cave ${caveSize} < ${params.minPlayableArea}`,
        );
      }

      throw new DisconnectedMapError(
        `No cave of at least ${params.minPlayableArea} tiles after ${totalAttempts} attempts`,
        {
          attempts: totalAttempts,
          minPlayableArea: params.minPlayableArea,
          largestCave: largestSeen,
        },
      );
    },
  };
}

// =============================================================================
// LOGICAL ROOMS
// =============================================================================

function grownRect(r: Rect, direction: GrowthDirection): Rect {
  switch (direction) {
    case "east":
      return { ...r, width: r.width + 1 };
    case "south":
      return { ...r, height: r.height + 1 };
    case "west":
      return { ...r, x: r.x - 1, width: r.width + 1 };
    case "north":
      return { ...r, y: r.y - 1, height: r.height + 1 };
  }
}

/**
 * The row or column a growth step would add
 */
function newStrip(r: Rect, direction: GrowthDirection): Point[] {
  const cells: Point[] = [];
  if (direction === "east" || direction === "west") {
    const x = direction === "east" ? r.x + r.width : r.x - 1;
    for (let y = r.y; y < r.y + r.height; y++) cells.push({ x, y });
  } else {
    const y = direction === "south" ? r.y + r.height : r.y - 1;
    for (let x = r.x; x < r.x + r.width; x++) cells.push({ x, y });
  }
  return cells;
}

/**
 * Grow a rectangle from a seed cell over floor, one strip at a time, until
 * no side can grow.
 */
export function growRoomRect(
  grid: ReadonlyGrid,
  seed: Point,
  maxSize: number,
  accepted: readonly Rect[],
): Rect {
  let current: Rect = { x: seed.x, y: seed.y, width: 1, height: 1 };
  let grew = true;

  while (grew) {
    grew = false;
    for (const direction of GROWTH_DIRECTIONS) {
      const candidate = grownRect(current, direction);
      if (candidate.width > maxSize || candidate.height > maxSize) continue;
      const stripIsFloor = newStrip(current, direction).every(
        (p) => grid.get(p.x, p.y) === TileType.FLOOR,
      );
      if (!stripIsFloor) continue;
      if (intersectsAny(candidate, accepted, CELLULAR_ROOM_PADDING)) continue;
      current = candidate;
      grew = true;
    }
  }

  return current;
}

/**
 * Derive logical rooms from shuffled seed cells of the cave.
 * No corridors: the cave itself connects every room.
 */
export function growRooms(
  params: ResolvedCellularParams,
): Pass<CaveArtifact, LayoutArtifact> {
  return {
    id: CELLULAR_ROOMS_PASS,
    run(input, ctx) {
      const { grid } = input;
      const floorCells: Point[] = [];
      for (let y = 0; y < grid.height; y++) {
        for (let x = 0; x < grid.width; x++) {
          if (grid.get(x, y) === TileType.FLOOR) floorCells.push({ x, y });
        }
      }

      const accepted: Rect[] = [];
      let largest: Rect | undefined;

      for (const seed of ctx.rng.shuffle(floorCells)) {
        if (accepted.length >= params.targetRoomCount) break;
        const cell: Rect = { x: seed.x, y: seed.y, width: 1, height: 1 };
        if (intersectsAny(cell, accepted, CELLULAR_ROOM_PADDING)) continue;

        const grown = growRoomRect(grid, seed, params.maxRoomSize, accepted);
        if (!largest || rectArea(grown) > rectArea(largest)) {
          largest = grown;
        }
        if (
          grown.width >= params.minRoomSize &&
          grown.height >= params.minRoomSize
        ) {
          accepted.push(grown);
        }
      }

      let fallback = false;
      if (accepted.length === 0 && largest) {
        ctx.trace.warning(
          CELLULAR_ROOMS_PASS,
          `No area reached ${params.minRoomSize}x${params.minRoomSize}; using the largest grown rectangle`,
        );
        accepted.push(largest);
        fallback = true;
      }

      const rooms: RoomShape[] = accepted.map((r, id) => ({ id, ...r }));
      ctx.trace.decision(CELLULAR_ROOMS_PASS, {
        kind: "logical-rooms",
        target: params.targetRoomCount,
        rooms: rooms.length,
        fallback,
      });

      return { type: "layout", grid, rooms, corridors: [], warnings: [] };
    },
  };
}
