import {
  type AreaTemplate,
  InvalidParameterError,
  type RoomType,
  type SerializedDungeonMap,
  SerializedDungeonMapSchema,
  type TileTag,
} from "@wyrmhold/contracts";
import { rectFitsIn } from "../core/geometry/operations";
import type { Point } from "../core/geometry/types";
import { Grid } from "../core/grid/grid";
import {
  isTileType,
  type ReadonlyGrid,
  type TileLookup,
  TileType,
} from "../core/grid/types";
import { calculateChecksum } from "../core/hash/checksum";
import type { Corridor } from "./corridor";
import { NO_FEATURES, type Room, type RoomFeatures, type RoomShape } from "./room";

const TILE_TAG_BY_TYPE: Record<TileType, TileTag> = {
  [TileType.FLOOR]: "floor",
  [TileType.WALL]: "wall",
  [TileType.DOOR]: "door",
};

const TILE_TYPE_BY_TAG: Record<TileTag, TileType> = {
  floor: TileType.FLOOR,
  wall: TileType.WALL,
  door: TileType.DOOR,
};

/**
 * Room as handed to the map: geometry, plus content when restoring a
 * serialized map.
 */
export type RoomInit = RoomShape & Partial<RoomFeatures> & {
  readonly type?: RoomType;
};

export interface DungeonMapInit {
  /** Terrain; the map takes ownership of this grid */
  readonly grid: Grid;
  readonly rooms: readonly RoomInit[];
  readonly corridors: readonly Corridor[];
  readonly seed: number;
  readonly template: AreaTemplate;
}

interface RoomRecord {
  readonly shape: RoomShape;
  type: RoomType;
  features: RoomFeatures;
}

function toRoomView(record: RoomRecord): Room {
  return Object.freeze({
    id: record.shape.id,
    x: record.shape.x,
    y: record.shape.y,
    width: record.shape.width,
    height: record.shape.height,
    type: record.type,
    monsters: record.features.monsters,
    treasures: record.features.treasures,
    traps: record.features.traps,
  });
}

/**
 * A generated area: tile grid, rooms in generation order, corridors and the
 * seed/template that produced them.
 *
 * Geometry is fixed at construction. Room tags and feature counts change
 * only through {@link DungeonMap.setRoomContent}, which the content
 * populator calls once per room.
 */
export class DungeonMap {
  readonly width: number;
  readonly height: number;
  readonly seed: number;
  readonly template: AreaTemplate;
  readonly corridors: readonly Corridor[];
  private readonly grid: Grid;
  private readonly records: RoomRecord[];

  constructor(init: DungeonMapInit) {
    this.grid = init.grid;
    this.width = init.grid.width;
    this.height = init.grid.height;
    this.seed = init.seed;
    this.template = init.template;

    const ids = new Set<number>();
    this.records = init.rooms.map((room) => {
      if (ids.has(room.id)) {
        throw new Error(`Duplicate room id ${room.id}`);
      }
      if (!rectFitsIn(room, this.grid.getDimensions())) {
        throw new Error(
          `Room ${room.id} (${room.x}, ${room.y}, ${room.width}x${room.height}) lies outside the ${this.width}x${this.height} map`,
        );
      }
      ids.add(room.id);
      return {
        shape: {
          id: room.id,
          x: room.x,
          y: room.y,
          width: room.width,
          height: room.height,
        },
        type: room.type ?? "normal",
        features: {
          monsters: room.monsters ?? NO_FEATURES.monsters,
          treasures: room.treasures ?? NO_FEATURES.treasures,
          traps: room.traps ?? NO_FEATURES.traps,
        },
      };
    });

    this.corridors = Object.freeze(
      init.corridors.map((corridor) =>
        Object.freeze({
          fromRoomId: corridor.fromRoomId,
          toRoomId: corridor.toRoomId,
          path: Object.freeze(corridor.path.map((p) => ({ x: p.x, y: p.y }))),
        }),
      ),
    );
  }

  // ===========================================================================
  // TILES
  // ===========================================================================

  /**
   * Tile at (x, y), or OUT_OF_BOUNDS outside the map. Never throws.
   */
  getTile(x: number, y: number): TileLookup {
    return this.grid.get(x, y);
  }

  isFloor(x: number, y: number): boolean {
    return this.grid.get(x, y) === TileType.FLOOR;
  }

  /**
   * Read-only handle on the terrain
   */
  get terrain(): ReadonlyGrid {
    return this.grid;
  }

  // ===========================================================================
  // ROOMS
  // ===========================================================================

  /**
   * Room views in generation order. Views are snapshots: they do not
   * follow later content updates.
   */
  get rooms(): readonly Room[] {
    return this.records.map(toRoomView);
  }

  getRoom(id: number): Room | undefined {
    const record = this.records.find((r) => r.shape.id === id);
    return record ? toRoomView(record) : undefined;
  }

  findRoomsByType(type: RoomType): Room[] {
    return this.records.filter((r) => r.type === type).map(toRoomView);
  }

  /**
   * Tag a room and set its feature counts.
   */
  setRoomContent(id: number, type: RoomType, features: RoomFeatures): void {
    const record = this.records.find((r) => r.shape.id === id);
    if (!record) {
      throw new Error(`Unknown room id ${id}`);
    }
    record.type = type;
    record.features = {
      monsters: Math.max(0, features.monsters),
      treasures: Math.max(0, features.treasures),
      traps: Math.max(0, features.traps),
    };
  }

  // ===========================================================================
  // SERIALIZATION
  // ===========================================================================

  checksum(): string {
    return calculateChecksum({
      width: this.width,
      height: this.height,
      terrain: this.grid.getRawDataCopy(),
      rooms: this.rooms,
      corridors: this.corridors,
    });
  }

  /**
   * Plain structure for persistence and preview collaborators.
   */
  toJSON(): SerializedDungeonMap {
    return {
      width: this.width,
      height: this.height,
      tiles: Array.from(this.grid.getRawDataCopy(), (value) =>
        isTileType(value) ? TILE_TAG_BY_TYPE[value] : "wall",
      ),
      rooms: this.rooms.map((room) => ({
        id: room.id,
        x: room.x,
        y: room.y,
        w: room.width,
        h: room.height,
        type: room.type,
        monsters: room.monsters,
        treasures: room.treasures,
        traps: room.traps,
      })),
      corridors: this.corridors.map((corridor) => ({
        room_a: corridor.fromRoomId,
        room_b: corridor.toRoomId,
        path: corridor.path.map((p): [number, number] => [p.x, p.y]),
      })),
      seed: this.seed,
      template: this.template,
    };
  }

  /**
   * Rebuild a map from its plain structure.
   *
   * @throws InvalidParameterError when the data does not match the contract
   */
  static fromJSON(data: unknown): DungeonMap {
    const parsed = SerializedDungeonMapSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidParameterError("Invalid serialized map", {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }

    const value = parsed.data;
    const grid = Grid.fromTiles(
      value.width,
      value.height,
      value.tiles.map((tag) => TILE_TYPE_BY_TAG[tag]),
    );

    const corridors: Corridor[] = value.corridors.map((corridor, index) => {
      const path: Point[] = corridor.path.map(([x, y]) => ({ x, y }));
      const outside = path.find((p) => !grid.isInBounds(p.x, p.y));
      if (outside) {
        throw new InvalidParameterError(
          `Corridor ${index} leaves the map at (${outside.x}, ${outside.y})`,
          { corridor: index },
        );
      }
      return { fromRoomId: corridor.room_a, toRoomId: corridor.room_b, path };
    });

    const roomIds = new Set(value.rooms.map((room) => room.id));
    if (roomIds.size !== value.rooms.length) {
      throw new InvalidParameterError("Duplicate room ids in serialized map");
    }

    return new DungeonMap({
      grid,
      rooms: value.rooms.map((room) => ({
        id: room.id,
        x: room.x,
        y: room.y,
        width: room.w,
        height: room.h,
        type: room.type,
        monsters: room.monsters,
        treasures: room.treasures,
        traps: room.traps,
      })),
      corridors,
      seed: value.seed,
      template: value.template,
    });
  }
}
