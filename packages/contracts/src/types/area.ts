/**
 * Area vocabulary shared by the generator and its collaborators.
 */

export const AREA_THEMES = [
  "dungeon",
  "cave",
  "forest",
  "ruins",
  "castle",
  "temple",
  "sewers",
  "underground_city",
] as const;

export type AreaTheme = (typeof AREA_THEMES)[number];

export const LAYOUT_ALGORITHMS = ["bsp", "cellular", "simple_random"] as const;

export type LayoutAlgorithm = (typeof LAYOUT_ALGORITHMS)[number];

export const ROOM_TYPES = ["normal", "spawn", "boss"] as const;

export type RoomType = (typeof ROOM_TYPES)[number];

/** Serialized tile tags, indexed by the engine's numeric tile values */
export const TILE_TAGS = ["floor", "wall", "door"] as const;

export type TileTag = (typeof TILE_TAGS)[number];
