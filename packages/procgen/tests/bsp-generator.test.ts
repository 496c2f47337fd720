import { GenerationTimeoutError, InvalidParameterError } from "@wyrmhold/contracts";
import { describe, expect, it } from "vitest";
import {
  BSP_CORRIDORS_PASS,
  BSP_PARTITION_PASS,
  BSP_ROOMS_PASS,
  bspGenerator,
  createAreaTemplate,
  DEFAULT_BSP_PARAMS,
  generate,
  rectCenter,
  resolveBSPParams,
  roomsIntersect,
  validateDungeonMap,
} from "../src";

describe("BSP generator", () => {
  it("generates a valid 40x40 dungeon from seed 42", () => {
    const template = createAreaTemplate("dungeon", {
      width: 40,
      height: 40,
      bsp: { minLeafSize: 6, maxDepth: 4 },
    });
    const area = generate(42, template).getOrThrow();
    const { map, assignment } = area;

    expect(map.width).toBe(40);
    expect(map.height).toBe(40);
    expect(map.rooms.length).toBeGreaterThanOrEqual(2);
    expect(map.rooms.length).toBeLessThanOrEqual(16);
    expect(assignment.spawnRoomId).not.toBe(assignment.bossRoomId);
    expect(map.getRoom(assignment.spawnRoomId)?.type).toBe("spawn");
    expect(map.getRoom(assignment.bossRoomId)?.type).toBe("boss");
    expect(validateDungeonMap(map)).toEqual({ success: true, violations: [] });
  });

  it("reproduces the reference layout for seed 42", () => {
    const template = createAreaTemplate("dungeon", {
      width: 40,
      height: 40,
      bsp: { minLeafSize: 6, maxDepth: 4 },
    });
    const { map } = generate(42, template).getOrThrow();

    expect(map.rooms).toHaveLength(12);
    expect(map.corridors).toHaveLength(11);
    expect(map.rooms[0]).toMatchObject({ id: 0, x: 2, y: 2, width: 7, height: 7, type: "spawn" });
    expect(map.rooms[11]).toMatchObject({ id: 11, x: 29, y: 33, width: 3, height: 6, type: "boss" });
    expect(map.rooms[9]).toMatchObject({ monsters: 4, treasures: 2, traps: 2 });
    expect(map.checksum()).toBe("v1:44a5eca1677e69c1");
  });

  it("joins n rooms with n - 1 corridors", () => {
    const map = generate(7, createAreaTemplate("dungeon")).getOrThrow().map;
    expect(map.corridors).toHaveLength(map.rooms.length - 1);
  });

  it("keeps every pair of rooms apart by the padding", () => {
    const template = createAreaTemplate("castle", { bsp: { roomPadding: 2 } });
    for (let seed = 1; seed <= 10; seed++) {
      const rooms = generate(seed, template).getOrThrow().map.rooms;
      for (let i = 0; i < rooms.length; i++) {
        for (let j = i + 1; j < rooms.length; j++) {
          const a = rooms[i];
          const b = rooms[j];
          if (a && b) expect(roomsIntersect(a, b, 2)).toBe(false);
        }
      }
    }
  });

  it("places one room per leaf of a single vertical split", () => {
    // 16 wide with leaves of at least 8: the only split is x = 8
    const template = createAreaTemplate("dungeon", {
      width: 16,
      height: 10,
      bsp: { minLeafSize: 8, minRoomSize: 3, roomPadding: 1 },
    });
    const { map, trace } = generate(1, template, { trace: true }).getOrThrow();
    const [left, right] = map.rooms;

    expect(map.rooms).toHaveLength(2);
    expect(left?.x).toBeGreaterThanOrEqual(1);
    expect((left?.x ?? 0) + (left?.width ?? 0)).toBeLessThanOrEqual(7);
    expect(right?.x).toBeGreaterThanOrEqual(9);
    expect((right?.x ?? 0) + (right?.width ?? 0)).toBeLessThanOrEqual(15);
    expect(map.corridors).toEqual([
      expect.objectContaining({ fromRoomId: 0, toRoomId: 1 }),
    ]);
    expect(
      trace.flatMap((e) => (e.eventType === "decision" ? [e.decision] : [])).slice(0, 2),
    ).toEqual([
      {
        kind: "split",
        node: { x: 0, y: 0, width: 16, height: 10 },
        axis: "x",
        at: 8,
        drawn: false,
      },
      { kind: "rooms-placed", leaves: 2, rooms: 2 },
    ]);
  });

  it("routes each corridor from center to center", () => {
    const map = generate(99, createAreaTemplate("ruins")).getOrThrow().map;
    for (const corridor of map.corridors) {
      const from = map.getRoom(corridor.fromRoomId);
      const to = map.getRoom(corridor.toRoomId);
      expect(from && to).toBeTruthy();
      if (!from || !to) continue;
      expect(corridor.path[0]).toEqual(rectCenter(from));
      expect(corridor.path[corridor.path.length - 1]).toEqual(rectCenter(to));
    }
  });

  it("fails with a timeout when the bounds leave too few leaves", () => {
    const template = createAreaTemplate("dungeon", {
      width: 16,
      height: 10,
      bsp: { minLeafSize: 8, minRoomCount: 3 },
    });
    const result = generate(1, template);

    expect(result.isErr()).toBe(true);
    expect(result.error).toBeInstanceOf(GenerationTimeoutError);
    expect(result.error.code).toBe("GENERATION_TIMEOUT");
    expect(result.error.details).toEqual({ leaves: 2, minRoomCount: 3, maxDepth: 4 });
  });

  it("rejects leaves too small for a padded room", () => {
    const template = createAreaTemplate("dungeon", {
      bsp: { minLeafSize: 4, minRoomSize: 3, roomPadding: 1 },
    });
    const result = generate(1, template);

    expect(result.isErr()).toBe(true);
    expect(result.error).toBeInstanceOf(InvalidParameterError);
  });

  it("merges template parameters over the defaults", () => {
    const params = resolveBSPParams(
      createAreaTemplate("dungeon", { bsp: { maxDepth: 2 } }),
    );
    expect(params).toEqual({ ...DEFAULT_BSP_PARAMS, maxDepth: 2 });
  });

  it("runs partition, room placement and corridor passes in order", () => {
    const pipeline = bspGenerator.createPipeline(createAreaTemplate("dungeon"));
    expect(pipeline.passIds).toEqual([
      BSP_PARTITION_PASS,
      BSP_ROOMS_PASS,
      BSP_CORRIDORS_PASS,
    ]);
  });
});
