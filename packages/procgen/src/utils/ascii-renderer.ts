/**
 * ASCII Map Renderer
 *
 * Renders maps as plain text for previews and debugging.
 *
 * @example
 * ```typescript
 * const area = generateArea("dungeon", 12345).getOrThrow();
 * console.log(renderAscii(area.map));
 * ```
 */

import { rectCenter } from "../core/geometry/operations";
import { TileType } from "../core/grid/types";
import type { DungeonMap } from "../model/dungeon-map";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Character mapping for tiles and markers
 */
export interface AsciiCharset {
  readonly wall: string;
  readonly floor: string;
  readonly door: string;
  readonly spawn: string;
  readonly boss: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "#",
  floor: ".",
  door: "+",
  spawn: "@",
  boss: "B",
};

/**
 * Render options
 */
export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Mark spawn and boss room centers. Default: true */
  readonly showRoles?: boolean;
  /** Number the rows and columns (last digit) */
  readonly showCoordinates?: boolean;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

function tileChar(tile: number, charset: AsciiCharset): string {
  switch (tile) {
    case TileType.FLOOR:
      return charset.floor;
    case TileType.DOOR:
      return charset.door;
    default:
      return charset.wall;
  }
}

/**
 * Render a map as ASCII art, one line per row
 */
export function renderAscii(
  map: DungeonMap,
  options: RenderOptions = {},
): string {
  const {
    charset = DEFAULT_CHARSET,
    showRoles = true,
    showCoordinates = false,
  } = options;

  const rows: string[][] = [];
  for (let y = 0; y < map.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < map.width; x++) {
      row.push(tileChar(map.getTile(x, y), charset));
    }
    rows.push(row);
  }

  if (showRoles) {
    for (const room of map.rooms) {
      if (room.type === "normal") continue;
      const center = rectCenter(room);
      const row = rows[center.y];
      if (row) row[center.x] = room.type === "boss" ? charset.boss : charset.spawn;
    }
  }

  const lines = rows.map((row) => row.join(""));
  if (!showCoordinates) {
    return lines.join("\n");
  }

  let header = "   ";
  for (let x = 0; x < map.width; x++) header += String(x % 10);
  return [
    header,
    ...lines.map((line, y) => `${String(y % 100).padStart(2, " ")} ${line}`),
  ].join("\n");
}
