/**
 * Procedural content derived from a populated map. Read-only: nothing here
 * changes the map.
 */

import type { DungeonMap } from "../model/dungeon-map";
import { getTheme } from "../themes/catalog";
import { describeRooms, type RoomDescription } from "./descriptions";
import { deriveEncounters, type Encounter } from "./encounters";
import { generateQuest, type Quest } from "./quests";

export interface AreaContent {
  readonly encounters: readonly Encounter[];
  readonly descriptions: readonly RoomDescription[];
  readonly quest: Quest;
}

export function deriveContent(map: DungeonMap): AreaContent {
  const theme = getTheme(map.template.theme);
  const rooms = map.rooms;
  const encounters = deriveEncounters(rooms, map.template.recommendedLevel);
  const boss = rooms.find((room) => room.type === "boss") ?? rooms[rooms.length - 1];

  return {
    encounters,
    descriptions: describeRooms(rooms, theme.vocabulary),
    quest: generateQuest({
      seed: map.seed,
      theme,
      totalMonsters: rooms.reduce((sum, room) => sum + room.monsters, 0),
      encounterCount: encounters.length,
      targetRoomId: boss?.id ?? 0,
    }),
  };
}

export * from "./descriptions";
export * from "./encounters";
export * from "./quests";
