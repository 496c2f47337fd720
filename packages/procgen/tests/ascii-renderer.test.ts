import { describe, expect, it } from "vitest";
import {
  createAreaTemplate,
  DungeonMap,
  generate,
  Grid,
  NO_FEATURES,
  renderAscii,
  TileType,
} from "../src";

/**
 * Two single-tile rooms joined by a one-tile corridor
 */
function corridorMap(): DungeonMap {
  const grid = new Grid(5, 3);
  grid.fillRect(1, 1, 3, 1, TileType.FLOOR);
  const map = new DungeonMap({
    grid,
    rooms: [
      { id: 0, x: 1, y: 1, width: 1, height: 1 },
      { id: 1, x: 3, y: 1, width: 1, height: 1 },
    ],
    corridors: [
      {
        fromRoomId: 0,
        toRoomId: 1,
        path: [
          { x: 1, y: 1 },
          { x: 2, y: 1 },
          { x: 3, y: 1 },
        ],
      },
    ],
    seed: 1,
    template: createAreaTemplate("dungeon", { width: 5, height: 5 }),
  });
  map.setRoomContent(0, "spawn", NO_FEATURES);
  map.setRoomContent(1, "boss", { ...NO_FEATURES, monsters: 2 });
  return map;
}

describe("renderAscii", () => {
  it("marks the spawn and boss room centers", () => {
    expect(renderAscii(corridorMap())).toBe(["#####", "#@.B#", "#####"].join("\n"));
  });

  it("renders plain tiles without roles", () => {
    expect(renderAscii(corridorMap(), { showRoles: false })).toBe(
      ["#####", "#...#", "#####"].join("\n"),
    );
  });

  it("numbers rows and columns", () => {
    expect(renderAscii(corridorMap(), { showCoordinates: true })).toBe(
      ["   01234", " 0 #####", " 1 #@.B#", " 2 #####"].join("\n"),
    );
  });

  it("uses a custom charset", () => {
    const charset = { wall: "X", floor: " ", door: "D", spawn: "S", boss: "!" };
    expect(renderAscii(corridorMap(), { charset })).toBe(
      ["XXXXX", "XS !X", "XXXXX"].join("\n"),
    );
  });

  it("draws one line per map row", () => {
    const { map } = generate(4, createAreaTemplate("dungeon", { width: 30, height: 20 })).getOrThrow();
    const lines = renderAscii(map).split("\n");
    expect(lines).toHaveLength(20);
    expect(lines.every((line) => line.length === 30)).toBe(true);
  });
});
