import { z } from "zod";
import { ROOM_TYPES, TILE_TAGS } from "../types/area";
import { AreaTemplateSchema, SeedSchema } from "./area-template";

const CoordinateSchema = z.number().int().min(0);

export const SerializedRoomSchema = z.object({
  id: z.number().int().min(0),
  x: CoordinateSchema,
  y: CoordinateSchema,
  w: z.number().int().min(1),
  h: z.number().int().min(1),
  type: z.enum(ROOM_TYPES),
  monsters: z.number().int().min(0),
  treasures: z.number().int().min(0),
  traps: z.number().int().min(0),
});

export const SerializedCorridorSchema = z.object({
  room_a: z.number().int().min(0),
  room_b: z.number().int().min(0),
  path: z.array(z.tuple([CoordinateSchema, CoordinateSchema])),
});

/**
 * Plain-structure contract of a generated map.
 * Persistence and the IDE preview rely on exactly these fields.
 */
export const SerializedDungeonMapSchema = z
  .object({
    width: z.number().int().min(1),
    height: z.number().int().min(1),
    tiles: z.array(z.enum(TILE_TAGS)),
    rooms: z.array(SerializedRoomSchema),
    corridors: z.array(SerializedCorridorSchema),
    seed: SeedSchema,
    template: AreaTemplateSchema,
  })
  .superRefine((data, ctx) => {
    if (data.tiles.length !== data.width * data.height) {
      ctx.addIssue({
        code: "custom",
        message: `Expected ${data.width * data.height} tiles, got ${data.tiles.length}`,
        path: ["tiles"],
      });
    }
    data.rooms.forEach((room, index) => {
      if (room.x + room.w > data.width || room.y + room.h > data.height) {
        ctx.addIssue({
          code: "custom",
          message: `Room ${room.id} extends outside the map`,
          path: ["rooms", index],
        });
      }
    });
  });

export type SerializedRoom = z.infer<typeof SerializedRoomSchema>;
export type SerializedCorridor = z.infer<typeof SerializedCorridorSchema>;
export type SerializedDungeonMap = z.infer<typeof SerializedDungeonMapSchema>;
