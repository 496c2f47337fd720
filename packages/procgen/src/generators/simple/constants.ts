/**
 * Simple Random Generator Constants
 */

export const DEFAULT_SIMPLE_PARAMS = {
  targetRoomCount: 10,
  minRoomSize: 4,
  maxRoomSize: 10,
  padding: 2,
} as const;

/** Placement attempts per requested room when maxAttempts is not set */
export const ATTEMPTS_PER_ROOM = 10;

/** Wall ring kept clear around the map edge */
export const MAP_BORDER = 1;

export const SIMPLE_PLACEMENT_PASS = "simple.place-rooms";
