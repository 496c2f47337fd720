import type { Point } from "../core/geometry/types";

/**
 * Ordered tile path joining two rooms, center to center.
 * Immutable once routed.
 */
export interface Corridor {
  readonly fromRoomId: number;
  readonly toRoomId: number;
  readonly path: readonly Point[];
}
