/**
 * Encounter derivation for monster-bearing rooms.
 */

import type { Room } from "../model/room";

export const ENCOUNTER_TYPES = [
  "monster_pack",
  "treasure_room",
  "trap_gauntlet",
  "boss_room",
  "puzzle_chamber",
] as const;

export type EncounterType = (typeof ENCOUNTER_TYPES)[number];

export const BASE_DIFFICULTY: Readonly<Record<EncounterType, number>> = {
  monster_pack: 0.5,
  treasure_room: 0.3,
  trap_gauntlet: 0.4,
  boss_room: 0.9,
  puzzle_chamber: 0.6,
};

/** Difficulty added per monster beyond the first */
export const EXTRA_MONSTER_FACTOR = 0.1;

export interface Encounter {
  readonly roomId: number;
  readonly encounterType: EncounterType;
  readonly difficulty: number;
  readonly monsters: number;
}

/**
 * First matching rule wins: boss, traps with treasure, traps at least as
 * many as monsters, treasure, plain monsters.
 */
export function classifyEncounter(room: Room): EncounterType {
  if (room.type === "boss") return "boss_room";
  if (room.traps > 0 && room.treasures > 0) return "puzzle_chamber";
  if (room.traps > 0 && room.traps >= room.monsters) return "trap_gauntlet";
  if (room.treasures > 0) return "treasure_room";
  return "monster_pack";
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * base × level × (1 + 0.1 × (monsters − 1)), rounded to 2 decimals
 */
export function encounterDifficulty(
  encounterType: EncounterType,
  level: number,
  monsters: number,
): number {
  const crowd = 1 + EXTRA_MONSTER_FACTOR * Math.max(0, monsters - 1);
  return roundTo2(BASE_DIFFICULTY[encounterType] * level * crowd);
}

/**
 * One encounter per room holding at least one monster, in room order.
 */
export function deriveEncounters(
  rooms: readonly Room[],
  level: number,
): Encounter[] {
  return rooms
    .filter((room) => room.monsters > 0)
    .map((room) => {
      const encounterType = classifyEncounter(room);
      return {
        roomId: room.id,
        encounterType,
        difficulty: encounterDifficulty(encounterType, level, room.monsters),
        monsters: room.monsters,
      };
    });
}
