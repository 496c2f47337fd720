/**
 * Content Populator
 *
 * Tags the spawn and boss rooms and distributes monsters, treasure and
 * traps by template density. This is the only place room state changes
 * after layout generation.
 */

import type { SeededRandom } from "@wyrmhold/contracts";
import {
  BOSS_MONSTER_MAX,
  BOSS_MONSTER_MIN,
  FEATURE_AREA_UNIT,
} from "../../core/constants";
import { rectArea } from "../../core/geometry/operations";
import type { DungeonMap } from "../../model/dungeon-map";
import { NO_FEATURES, type RoomFeatures } from "../../model/room";
import { NoOpTraceCollector } from "../../pipeline/trace";
import type { TraceCollector } from "../../pipeline/types";

export const POPULATE_CONTENT_PASS = "content.populate";

export interface ContentAssignment {
  readonly spawnRoomId: number;
  /** Equals spawnRoomId when the map has a single room */
  readonly bossRoomId: number;
}

/**
 * Round to the nearest integer, never below zero. An exact half is settled
 * by the shared source, so it lands on either neighbor. Always consumes one
 * float, keeping the stream length independent of the values.
 */
export function jitterRound(value: number, rng: SeededRandom): number {
  const clamped = Math.max(0, value);
  const base = Math.floor(clamped);
  const fraction = clamped - base;
  const tieUp = rng.nextFloat() < 0.5;
  if (fraction > 0.5) return base + 1;
  if (fraction < 0.5) return base;
  return tieUp ? base + 1 : base;
}

/**
 * Expected feature count for a room: density per FEATURE_AREA_UNIT tiles
 */
export function expectedFeatureCount(density: number, area: number): number {
  return (density * area) / FEATURE_AREA_UNIT;
}

/**
 * Populate the map in place.
 *
 * The first room in generation order is the spawn, the last is the boss;
 * a single room is tagged boss and serves as both.
 */
export function populateContent(
  map: DungeonMap,
  rng: SeededRandom,
  trace: TraceCollector = new NoOpTraceCollector(),
): ContentAssignment {
  const rooms = map.rooms;
  const first = rooms[0];
  const last = rooms[rooms.length - 1];
  if (!first || !last) {
    throw new Error("Cannot populate a map without rooms");
  }

  const { monsterDensity, treasureDensity, trapDensity } = map.template;

  for (const room of rooms) {
    if (room.id === last.id) {
      const monsters = rng.nextInt(BOSS_MONSTER_MIN, BOSS_MONSTER_MAX);
      map.setRoomContent(room.id, "boss", { ...NO_FEATURES, monsters });
      continue;
    }
    if (room.id === first.id) {
      map.setRoomContent(room.id, "spawn", NO_FEATURES);
      continue;
    }

    const area = rectArea(room);
    const features: RoomFeatures = {
      monsters: jitterRound(expectedFeatureCount(monsterDensity, area), rng),
      treasures: jitterRound(expectedFeatureCount(treasureDensity, area), rng),
      traps: jitterRound(expectedFeatureCount(trapDensity, area), rng),
    };
    map.setRoomContent(room.id, "normal", features);
  }

  trace.decision(POPULATE_CONTENT_PASS, {
    kind: "content-roles",
    spawnRoomId: first.id,
    bossRoomId: last.id,
    roomCount: rooms.length,
  });

  return { spawnRoomId: first.id, bossRoomId: last.id };
}
