/**
 * L-shaped corridor routing between room centers.
 *
 * No obstacle avoidance: a corridor may cut through another room, which
 * just widens that room's floor.
 */

import type { SeededRandom } from "@wyrmhold/contracts";
import { rectCenter } from "../../core/geometry/operations";
import type { Point } from "../../core/geometry/types";
import type { MutableGrid } from "../../core/grid/types";
import { TileType } from "../../core/grid/types";
import type { Corridor } from "../../model/corridor";
import type { RoomShape } from "../../model/room";

export const CorridorOrientation = {
  HORIZONTAL_FIRST: "horizontal-first",
  VERTICAL_FIRST: "vertical-first",
} as const;

export type CorridorOrientation =
  (typeof CorridorOrientation)[keyof typeof CorridorOrientation];

const ORIENTATIONS = [
  CorridorOrientation.HORIZONTAL_FIRST,
  CorridorOrientation.VERTICAL_FIRST,
] as const;

/**
 * Axis-aligned run from `from` to `to`, both ends included
 */
function straightRun(from: Point, to: Point): Point[] {
  const points: Point[] = [];
  const dx = Math.sign(to.x - from.x);
  const dy = Math.sign(to.y - from.y);
  const steps = Math.max(Math.abs(to.x - from.x), Math.abs(to.y - from.y));

  for (let i = 0; i <= steps; i++) {
    points.push({ x: from.x + dx * i, y: from.y + dy * i });
  }
  return points;
}

/**
 * Single-bend path between two points. The bend tile appears once.
 */
export function buildLPath(
  from: Point,
  to: Point,
  orientation: CorridorOrientation,
): Point[] {
  const bend =
    orientation === CorridorOrientation.HORIZONTAL_FIRST
      ? { x: to.x, y: from.y }
      : { x: from.x, y: to.y };

  return [...straightRun(from, bend), ...straightRun(bend, to).slice(1)];
}

/**
 * Route a corridor between the centers of two rooms.
 * Consumes exactly one `rng.choice` for the bend orientation.
 */
export function routeCorridor(
  from: RoomShape,
  to: RoomShape,
  rng: SeededRandom,
): Corridor {
  const orientation = rng.choice(ORIENTATIONS);
  return {
    fromRoomId: from.id,
    toRoomId: to.id,
    path: buildLPath(rectCenter(from), rectCenter(to), orientation),
  };
}

/**
 * Flip every tile of the corridor path to floor
 */
export function carveCorridor(grid: MutableGrid, corridor: Corridor): void {
  for (const p of corridor.path) {
    grid.setAt(p, TileType.FLOOR);
  }
}

/**
 * Route and carve in one step
 */
export function connectRooms(
  grid: MutableGrid,
  from: RoomShape,
  to: RoomShape,
  rng: SeededRandom,
): Corridor {
  const corridor = routeCorridor(from, to, rng);
  carveCorridor(grid, corridor);
  return corridor;
}
