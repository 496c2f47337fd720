import { SeededRandom } from "@wyrmhold/contracts";
import { describe, expect, it } from "vitest";
import {
  buildLPath,
  carveCorridor,
  connectRooms,
  CorridorOrientation,
  Grid,
  manhattanDistance,
  type Point,
  type RoomShape,
  routeCorridor,
  TileType,
} from "../src";

function isContiguous(path: readonly Point[]): boolean {
  for (let i = 1; i < path.length; i++) {
    const prev = path[i - 1];
    const next = path[i];
    if (!prev || !next || manhattanDistance(prev, next) !== 1) return false;
  }
  return true;
}

describe("buildLPath", () => {
  const from = { x: 1, y: 1 };
  const to = { x: 4, y: 3 };

  it("walks horizontally first", () => {
    expect(buildLPath(from, to, CorridorOrientation.HORIZONTAL_FIRST)).toEqual([
      { x: 1, y: 1 },
      { x: 2, y: 1 },
      { x: 3, y: 1 },
      { x: 4, y: 1 },
      { x: 4, y: 2 },
      { x: 4, y: 3 },
    ]);
  });

  it("walks vertically first", () => {
    expect(buildLPath(from, to, CorridorOrientation.VERTICAL_FIRST)).toEqual([
      { x: 1, y: 1 },
      { x: 1, y: 2 },
      { x: 1, y: 3 },
      { x: 2, y: 3 },
      { x: 3, y: 3 },
      { x: 4, y: 3 },
    ]);
  });

  it("walks toward lower coordinates", () => {
    expect(buildLPath(to, from, CorridorOrientation.HORIZONTAL_FIRST)).toEqual([
      { x: 4, y: 3 },
      { x: 3, y: 3 },
      { x: 2, y: 3 },
      { x: 1, y: 3 },
      { x: 1, y: 2 },
      { x: 1, y: 1 },
    ]);
  });

  it("is a single tile between identical points", () => {
    expect(
      buildLPath({ x: 2, y: 2 }, { x: 2, y: 2 }, CorridorOrientation.VERTICAL_FIRST),
    ).toEqual([{ x: 2, y: 2 }]);
  });

  it("is straight when the points share a row", () => {
    const path = buildLPath({ x: 0, y: 5 }, { x: 3, y: 5 }, CorridorOrientation.VERTICAL_FIRST);
    expect(path).toHaveLength(4);
    expect(path.every((p) => p.y === 5)).toBe(true);
  });
});

describe("routeCorridor", () => {
  const a: RoomShape = { id: 0, x: 0, y: 0, width: 3, height: 3 };
  const b: RoomShape = { id: 1, x: 6, y: 4, width: 3, height: 3 };

  it("joins the room centers with one bend", () => {
    const corridor = routeCorridor(a, b, new SeededRandom(3));

    expect(corridor.fromRoomId).toBe(0);
    expect(corridor.toRoomId).toBe(1);
    expect(corridor.path[0]).toEqual({ x: 1, y: 1 });
    expect(corridor.path[corridor.path.length - 1]).toEqual({ x: 7, y: 5 });
    expect(corridor.path).toHaveLength(11);
    expect(isContiguous(corridor.path)).toBe(true);
    expect([
      buildLPath({ x: 1, y: 1 }, { x: 7, y: 5 }, CorridorOrientation.HORIZONTAL_FIRST),
      buildLPath({ x: 1, y: 1 }, { x: 7, y: 5 }, CorridorOrientation.VERTICAL_FIRST),
    ]).toContainEqual(corridor.path);
  });

  it("consumes exactly one draw", () => {
    const used = new SeededRandom(11);
    const reference = new SeededRandom(11);
    routeCorridor(a, b, used);
    reference.nextFloat();
    expect(used.getState()).toEqual(reference.getState());
  });

  it("uses both orientations across seeds", () => {
    const bends = new Set<string>();
    for (let seed = 0; seed < 32; seed++) {
      const path = routeCorridor(a, b, new SeededRandom(seed)).path;
      bends.add(JSON.stringify(path[1]));
    }
    expect(bends.size).toBe(2);
  });
});

describe("carving", () => {
  it("flips the path to floor", () => {
    const grid = new Grid(10, 8);
    carveCorridor(grid, {
      fromRoomId: 0,
      toRoomId: 1,
      path: [
        { x: 2, y: 2 },
        { x: 3, y: 2 },
      ],
    });
    expect(grid.get(2, 2)).toBe(TileType.FLOOR);
    expect(grid.get(3, 2)).toBe(TileType.FLOOR);
    expect(grid.countCells(TileType.FLOOR)).toBe(2);
  });

  it("routes and carves in one step", () => {
    const grid = new Grid(10, 8);
    const corridor = connectRooms(
      grid,
      { id: 0, x: 0, y: 0, width: 3, height: 3 },
      { id: 1, x: 6, y: 4, width: 3, height: 3 },
      new SeededRandom(5),
    );
    expect(grid.countCells(TileType.FLOOR)).toBe(11);
    expect(corridor.path.every((p) => grid.getAt(p) === TileType.FLOOR)).toBe(true);
  });
});
