/**
 * BSP Generator Constants
 */

import type { ResolvedBSPParams } from "./generator";

export const DEFAULT_BSP_PARAMS: ResolvedBSPParams = {
  minLeafSize: 8,
  maxDepth: 4,
  minRoomSize: 3,
  roomPadding: 1,
  minRoomCount: 1,
};

/** "x" cuts the width (children side by side), "y" cuts the height */
export const SPLIT_AXES = ["x", "y"] as const;

export type SplitAxis = (typeof SPLIT_AXES)[number];

// =============================================================================
// PASS IDS
// =============================================================================

export const BSP_PARTITION_PASS = "bsp.partition";
export const BSP_ROOMS_PASS = "bsp.place-rooms";
export const BSP_CORRIDORS_PASS = "bsp.connect-rooms";
