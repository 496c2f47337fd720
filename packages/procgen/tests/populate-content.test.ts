import { SeededRandom } from "@wyrmhold/contracts";
import { describe, expect, it } from "vitest";
import {
  type AreaTemplateOverrides,
  createAreaTemplate,
  DungeonMap,
  expectedFeatureCount,
  FEATURE_AREA_UNIT,
  generate,
  Grid,
  jitterRound,
  populateContent,
  rectArea,
  type RoomShape,
  TileType,
} from "../src";

function buildMap(
  rooms: RoomShape[],
  densities: AreaTemplateOverrides = {},
): DungeonMap {
  const grid = new Grid(20, 10);
  for (const room of rooms) {
    grid.fillRect(room.x, room.y, room.width, room.height, TileType.FLOOR);
  }
  return new DungeonMap({
    grid,
    rooms,
    corridors: [],
    seed: 1,
    template: createAreaTemplate("dungeon", { width: 20, height: 10, ...densities }),
  });
}

describe("jitterRound", () => {
  it("keeps whole numbers and clamps negatives to zero", () => {
    const rng = new SeededRandom(5);
    expect(jitterRound(3, rng)).toBe(3);
    expect(jitterRound(0, rng)).toBe(0);
    expect(jitterRound(-2, rng)).toBe(0);
  });

  it("rounds to a neighboring integer", () => {
    const rng = new SeededRandom(6);
    for (let i = 0; i < 50; i++) {
      expect([2, 3]).toContain(jitterRound(2.5, rng));
    }
  });

  it("rounds to the nearest integer away from a tie", () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 50; i++) {
      expect(jitterRound(0.2, rng)).toBe(0);
      expect(jitterRound(0.7, rng)).toBe(1);
      expect(jitterRound(3.49, rng)).toBe(3);
      expect(jitterRound(3.51, rng)).toBe(4);
    }
  });

  it("settles an exact half either way", () => {
    const rng = new SeededRandom(9);
    const seen = new Set<number>();
    for (let i = 0; i < 200; i++) seen.add(jitterRound(2.5, rng));
    expect([...seen].sort()).toEqual([2, 3]);
  });

  it("always consumes one draw", () => {
    const used = new SeededRandom(8);
    const reference = new SeededRandom(8);
    jitterRound(4, used);
    reference.nextFloat();
    expect(used.getState()).toEqual(reference.getState());
  });
});

describe("populateContent", () => {
  const rooms: RoomShape[] = [
    { id: 0, x: 1, y: 1, width: 4, height: 4 },
    { id: 1, x: 8, y: 1, width: 4, height: 4 },
    { id: 2, x: 14, y: 1, width: 4, height: 8 },
  ];

  it("scales feature counts with density per area unit", () => {
    expect(FEATURE_AREA_UNIT).toBe(16);
    expect(expectedFeatureCount(0.5, 32)).toBe(1);
    expect(expectedFeatureCount(0, 100)).toBe(0);
  });

  it("tags the first room spawn and the last room boss", () => {
    const map = buildMap(rooms, { monsterDensity: 1, treasureDensity: 0, trapDensity: 0.5 });
    const assignment = populateContent(map, new SeededRandom(1));
    const [spawn, normal, boss] = map.rooms;

    expect(assignment).toEqual({ spawnRoomId: 0, bossRoomId: 2 });
    expect(spawn).toMatchObject({ type: "spawn", monsters: 0, treasures: 0, traps: 0 });
    expect(normal).toMatchObject({ type: "normal", monsters: 1, treasures: 0 });
    expect([0, 1]).toContain(normal?.traps);
    expect(boss).toMatchObject({ type: "boss", treasures: 0, traps: 0 });
    expect(boss?.monsters).toBeGreaterThanOrEqual(2);
    expect(boss?.monsters).toBeLessThanOrEqual(4);
  });

  it("makes a single room the boss room and the spawn", () => {
    const map = buildMap([{ id: 0, x: 2, y: 2, width: 5, height: 5 }]);
    const assignment = populateContent(map, new SeededRandom(2));

    expect(assignment).toEqual({ spawnRoomId: 0, bossRoomId: 0 });
    expect(map.rooms[0]?.type).toBe("boss");
    expect(map.findRoomsByType("spawn")).toEqual([]);
  });

  it("places nothing at zero density", () => {
    const map = buildMap(rooms, { monsterDensity: 0, treasureDensity: 0, trapDensity: 0 });
    populateContent(map, new SeededRandom(3));
    expect(map.getRoom(1)).toMatchObject({ monsters: 0, treasures: 0, traps: 0 });
  });

  it("rounds expected counts to the nearest integer", () => {
    for (let seed = 1; seed <= 40; seed++) {
      const low = buildMap(rooms, { monsterDensity: 0.2, treasureDensity: 0.7, trapDensity: 0.45 });
      populateContent(low, new SeededRandom(seed));
      expect(low.getRoom(1)).toMatchObject({ monsters: 0, treasures: 1, traps: 0 });
    }
  });

  it("refuses a map without rooms", () => {
    expect(() => populateContent(buildMap([]), new SeededRandom(4))).toThrow(
      "Cannot populate a map without rooms",
    );
  });

  it("matches the monster density across many maps", () => {
    const template = createAreaTemplate("dungeon", { monsterDensity: 0.5 });
    let monsters = 0;
    let area = 0;
    for (let seed = 1; seed <= 100; seed++) {
      const { map } = generate(seed, template).getOrThrow();
      for (const room of map.findRoomsByType("normal")) {
        monsters += room.monsters;
        area += rectArea(room);
      }
    }
    const observed = (monsters * FEATURE_AREA_UNIT) / area;
    expect(observed).toBeGreaterThan(0.4);
    expect(observed).toBeLessThan(0.6);
  });
});
