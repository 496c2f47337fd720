/**
 * Invariants checked across many seeds for each layout algorithm.
 */

import { type LayoutAlgorithm, SeededRandom } from "@wyrmhold/contracts";
import { describe, expect, it } from "vitest";
import {
  checkRoomConnectivity,
  createAreaTemplate,
  generate,
  OUT_OF_BOUNDS,
  TileType,
  validateDungeonMap,
} from "../src";

const PROPERTY_TEST_COUNT = 25;

const THEME_BY_ALGORITHM = {
  bsp: "dungeon",
  cellular: "cave",
  simple_random: "forest",
} as const satisfies Record<LayoutAlgorithm, string>;

const TEST_RNG = new SeededRandom(0x5eedc0de);

function randomSeeds(count: number): number[] {
  return Array.from({ length: count }, () => TEST_RNG.nextInt(0, 0x7fffffff));
}

describe.each(Object.entries(THEME_BY_ALGORITHM))("%s layouts", (_algorithm, theme) => {
  const seeds = randomSeeds(PROPERTY_TEST_COUNT);

  it("are identical for identical seeds", () => {
    for (const seed of seeds.slice(0, 5)) {
      const template = createAreaTemplate(theme);
      const first = generate(seed, template).getOrThrow().map;
      const second = generate(seed, template).getOrThrow().map;
      expect(second.checksum()).toBe(first.checksum());
    }
  });

  it("differ between neighboring seeds", () => {
    const template = createAreaTemplate(theme);
    let differing = 0;
    for (const seed of seeds.slice(0, 10)) {
      const a = generate(seed, template).getOrThrow().map;
      const b = generate(seed + 1, template).getOrThrow().map;
      if (a.checksum() !== b.checksum()) differing++;
    }
    expect(differing).toBeGreaterThanOrEqual(9);
  });

  it("pass structural validation", () => {
    for (const seed of seeds) {
      const { map } = generate(seed, createAreaTemplate(theme)).getOrThrow();
      expect(validateDungeonMap(map)).toEqual({ success: true, violations: [] });
      expect(checkRoomConnectivity(map)).toEqual([]);
    }
  });

  it("have one spawn and one boss room", () => {
    for (const seed of seeds) {
      const { map, assignment } = generate(seed, createAreaTemplate(theme)).getOrThrow();
      const bosses = map.findRoomsByType("boss");
      const spawns = map.findRoomsByType("spawn");

      expect(bosses.map((r) => r.id)).toEqual([assignment.bossRoomId]);
      expect(spawns).toHaveLength(map.rooms.length > 1 ? 1 : 0);
      expect(bosses[0]?.monsters).toBeGreaterThanOrEqual(2);
      expect(bosses[0]?.monsters).toBeLessThanOrEqual(4);
      for (const room of map.rooms) {
        expect(room.monsters).toBeGreaterThanOrEqual(0);
        expect(room.treasures).toBeGreaterThanOrEqual(0);
        expect(room.traps).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it("answer every lookup around the map", () => {
    const { map } = generate(seeds[0] ?? 1, createAreaTemplate(theme, { width: 24, height: 18 })).getOrThrow();
    for (let y = -2; y < map.height + 2; y++) {
      for (let x = -2; x < map.width + 2; x++) {
        const tile = map.getTile(x, y);
        if (map.terrain.isInBounds(x, y)) {
          expect([TileType.FLOOR, TileType.WALL]).toContain(tile);
        } else {
          expect(tile).toBe(OUT_OF_BOUNDS);
        }
      }
    }
  });
});
