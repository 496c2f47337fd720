/**
 * Simple Random Generator Passes
 */

import type { PartialGenerationWarning } from "@wyrmhold/contracts";
import { Grid } from "../../core/grid/grid";
import { TileType } from "../../core/grid/types";
import type { Corridor } from "../../model/corridor";
import type { RoomShape } from "../../model/room";
import { connectRooms } from "../../passes/carving/corridor-router";
import { intersectsAny } from "../../passes/validation/intersection";
import type { EmptyArtifact, LayoutArtifact, Pass } from "../../pipeline/types";
import { MAP_BORDER, SIMPLE_PLACEMENT_PASS } from "./constants";
import type { ResolvedSimpleParams } from "./generator";

/**
 * Rejection-sample rooms inside the map border, chaining each accepted room
 * to the previous one. Running out of attempts is not fatal: the rooms
 * placed so far are returned with a partial-generation warning.
 */
export function placeRandomRooms(
  params: ResolvedSimpleParams,
): Pass<EmptyArtifact, LayoutArtifact> {
  return {
    id: SIMPLE_PLACEMENT_PASS,
    run(input, ctx) {
      const grid = Grid.walls(input.width, input.height);
      const rooms: RoomShape[] = [];
      const corridors: Corridor[] = [];
      let attempts = 0;

      while (
        rooms.length < params.targetRoomCount &&
        attempts < params.maxAttempts
      ) {
        attempts++;
        const width = ctx.rng.nextInt(params.minRoomSize, params.maxRoomSize);
        const height = ctx.rng.nextInt(params.minRoomSize, params.maxRoomSize);
        const candidate: RoomShape = {
          id: rooms.length,
          x: ctx.rng.nextInt(MAP_BORDER, input.width - width - MAP_BORDER),
          y: ctx.rng.nextInt(MAP_BORDER, input.height - height - MAP_BORDER),
          width,
          height,
        };

        if (intersectsAny(candidate, rooms, params.padding)) continue;

        grid.fillRect(
          candidate.x,
          candidate.y,
          candidate.width,
          candidate.height,
          TileType.FLOOR,
        );
        const previous = rooms[rooms.length - 1];
        if (previous) {
          corridors.push(connectRooms(grid, previous, candidate, ctx.rng));
        }
        rooms.push(candidate);
      }

      const warnings: PartialGenerationWarning[] = [];
      if (rooms.length < params.targetRoomCount) {
        const warning: PartialGenerationWarning = {
          kind: "partial-generation",
          message: `Placed ${rooms.length} of ${params.targetRoomCount} rooms in ${attempts} attempts`,
          requestedRooms: params.targetRoomCount,
          placedRooms: rooms.length,
          attempts,
        };
        warnings.push(warning);
        ctx.trace.warning(SIMPLE_PLACEMENT_PASS, warning.message);
      }

      return { type: "layout", grid, rooms, corridors, warnings };
    },
  };
}
