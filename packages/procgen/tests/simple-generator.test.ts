import { InvalidParameterError } from "@wyrmhold/contracts";
import { describe, expect, it } from "vitest";
import {
  createAreaTemplate,
  generate,
  MAP_BORDER,
  resolveSimpleParams,
  roomsIntersect,
  SIMPLE_PLACEMENT_PASS,
  validateDungeonMap,
} from "../src";

describe("simple random generator", () => {
  it("returns a partial map with one warning when the rooms cannot fit", () => {
    const template = createAreaTemplate("forest", {
      width: 10,
      height: 10,
      simple: { targetRoomCount: 50, padding: 2 },
    });
    const area = generate(5, template, { trace: true }).getOrThrow();
    const placed = area.map.rooms.length;

    expect(placed).toBeGreaterThanOrEqual(1);
    expect(placed).toBeLessThan(50);
    expect(area.warnings).toEqual([
      {
        kind: "partial-generation",
        message: `Placed ${placed} of 50 rooms in 500 attempts`,
        requestedRooms: 50,
        placedRooms: placed,
        attempts: 500,
      },
    ]);
    expect(
      area.trace.filter(
        (event) => event.eventType === "warning" && event.passId === SIMPLE_PLACEMENT_PASS,
      ),
    ).toHaveLength(1);
  });

  it("chains each room to the previous one", () => {
    const { map } = generate(8, createAreaTemplate("forest")).getOrThrow();
    expect(map.corridors.map((c) => [c.fromRoomId, c.toRoomId])).toEqual(
      map.rooms.slice(1).map((room) => [room.id - 1, room.id]),
    );
  });

  it("keeps rooms inside the border and apart by the padding", () => {
    for (let seed = 1; seed <= 10; seed++) {
      const { map } = generate(seed, createAreaTemplate("underground_city")).getOrThrow();
      const rooms = map.rooms;

      for (const room of rooms) {
        expect(room.x).toBeGreaterThanOrEqual(MAP_BORDER);
        expect(room.y).toBeGreaterThanOrEqual(MAP_BORDER);
        expect(room.x + room.width).toBeLessThanOrEqual(map.width - MAP_BORDER);
        expect(room.y + room.height).toBeLessThanOrEqual(map.height - MAP_BORDER);
      }
      for (let i = 0; i < rooms.length; i++) {
        for (let j = i + 1; j < rooms.length; j++) {
          const a = rooms[i];
          const b = rooms[j];
          if (a && b) expect(roomsIntersect(a, b, 2)).toBe(false);
        }
      }
      expect(validateDungeonMap(map).success).toBe(true);
    }
  });

  it("derives the attempt budget and clamps room size to the interior", () => {
    const params = resolveSimpleParams(
      createAreaTemplate("forest", { width: 9, height: 20, simple: { targetRoomCount: 3 } }),
    );
    expect(params).toEqual({
      targetRoomCount: 3,
      minRoomSize: 4,
      maxRoomSize: 7,
      padding: 2,
      maxAttempts: 30,
    });
  });

  it("rejects maps too small for the minimum room", () => {
    const result = generate(1, createAreaTemplate("forest", { width: 5, height: 5 }));
    expect(result.isErr()).toBe(true);
    expect(result.error).toBeInstanceOf(InvalidParameterError);
  });
});
