/**
 * Invariant checks over a finished map. Each check returns the violations
 * it found; an empty list means the invariant holds.
 */

import { rectContainsPoint, rectFitsIn } from "../../core/geometry/operations";
import { reachableFrom } from "../../core/grid/flood-fill";
import { TileType } from "../../core/grid/types";
import type { DungeonMap } from "../../model/dungeon-map";
import type { Room } from "../../model/room";
import type { Violation } from "../../pipeline/types";
import { roomsIntersect } from "./intersection";

export function checkRoomBounds(map: DungeonMap): Violation[] {
  return map.rooms
    .filter((room) => !rectFitsIn(room, map))
    .map((room): Violation => ({
      type: "invariant.room.bounds",
      message: `Room ${room.id} (${room.x}, ${room.y}, ${room.width}x${room.height}) lies outside the ${map.width}x${map.height} map`,
      severity: "error",
    }));
}

/**
 * Every tile inside a room rectangle must be floor
 */
export function checkRoomFloors(map: DungeonMap): Violation[] {
  const violations: Violation[] = [];
  for (const room of map.rooms) {
    let walls = 0;
    for (let y = room.y; y < room.y + room.height; y++) {
      for (let x = room.x; x < room.x + room.width; x++) {
        if (!map.isFloor(x, y)) walls++;
      }
    }
    if (walls > 0) {
      violations.push({
        type: "invariant.room.floor",
        message: `Room ${room.id} has ${walls} non-floor tiles`,
        severity: "error",
      });
    }
  }
  return violations;
}

export function checkRoomOverlap(
  map: DungeonMap,
  padding: number,
): Violation[] {
  const violations: Violation[] = [];
  const rooms = map.rooms;
  for (let i = 0; i < rooms.length; i++) {
    for (let j = i + 1; j < rooms.length; j++) {
      const a = rooms[i];
      const b = rooms[j];
      if (a && b && roomsIntersect(a, b, padding)) {
        violations.push({
          type: "invariant.room.overlap",
          message: `Rooms ${a.id} and ${b.id} intersect with padding ${padding}`,
          severity: "error",
        });
      }
    }
  }
  return violations;
}

/**
 * Every floor tile lies in a room or on a corridor path
 */
export function checkFloorFootprint(map: DungeonMap): Violation[] {
  const onCorridor = new Set<number>();
  for (const corridor of map.corridors) {
    for (const p of corridor.path) {
      onCorridor.add(p.y * map.width + p.x);
    }
  }

  const rooms = map.rooms;
  let stray = 0;
  let firstStray: { x: number; y: number } | undefined;
  for (let y = 0; y < map.height; y++) {
    for (let x = 0; x < map.width; x++) {
      if (map.getTile(x, y) !== TileType.FLOOR) continue;
      if (onCorridor.has(y * map.width + x)) continue;
      if (rooms.some((room) => rectContainsPoint(room, { x, y }))) continue;
      stray++;
      firstStray ??= { x, y };
    }
  }

  if (stray === 0 || !firstStray) return [];
  return [
    {
      type: "invariant.floor.footprint",
      message: `${stray} floor tiles outside rooms and corridors, first at (${firstStray.x}, ${firstStray.y})`,
      severity: "error",
    },
  ];
}

function firstFloorTile(
  map: DungeonMap,
  room: Room,
): { x: number; y: number } | undefined {
  for (let y = room.y; y < room.y + room.height; y++) {
    for (let x = room.x; x < room.x + room.width; x++) {
      if (map.isFloor(x, y)) return { x, y };
    }
  }
  return undefined;
}

/**
 * Flood fill from the spawn room (or the first room on an unpopulated map)
 * must reach every floor tile of every room.
 */
export function checkRoomConnectivity(map: DungeonMap): Violation[] {
  const rooms = map.rooms;
  const origin = rooms.find((room) => room.type === "spawn") ?? rooms[0];
  if (!origin) return [];

  const start = firstFloorTile(map, origin);
  if (!start) {
    return [
      {
        type: "invariant.connectivity",
        message: `Room ${origin.id} has no floor to start from`,
        severity: "error",
      },
    ];
  }

  const reached = reachableFrom(map.terrain, start);
  const violations: Violation[] = [];
  for (const room of rooms) {
    let unreachable = false;
    for (let y = room.y; y < room.y + room.height && !unreachable; y++) {
      for (let x = room.x; x < room.x + room.width; x++) {
        if (map.isFloor(x, y) && reached[y * map.width + x] !== 1) {
          unreachable = true;
          break;
        }
      }
    }
    if (unreachable) {
      violations.push({
        type: "invariant.connectivity",
        message: `Room ${room.id} is not reachable from room ${origin.id}`,
        severity: "error",
      });
    }
  }
  return violations;
}
