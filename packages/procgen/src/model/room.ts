import type { RoomType } from "@wyrmhold/contracts";
import type { Rect } from "../core/geometry/types";

/**
 * Room geometry as produced by a layout generator, before content.
 */
export interface RoomShape extends Rect {
  readonly id: number;
}

/**
 * Feature counts assigned by the content populator
 */
export interface RoomFeatures {
  readonly monsters: number;
  readonly treasures: number;
  readonly traps: number;
}

/**
 * Read-only view of a room on a finished map
 */
export interface Room extends RoomShape, RoomFeatures {
  readonly type: RoomType;
}

export const NO_FEATURES: RoomFeatures = {
  monsters: 0,
  treasures: 0,
  traps: 0,
};
