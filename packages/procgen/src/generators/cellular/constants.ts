/**
 * Cellular Automata Generator Constants
 */

/** Fraction of the map the kept cave must cover when not configured */
export const DEFAULT_MIN_PLAYABLE_RATIO = 0.1;

export const DEFAULT_CELLULAR_PARAMS = {
  fillProbability: 0.5,
  iterations: 3,
  birthThreshold: 4,
  maxRetries: 5,
  targetRoomCount: 6,
  minRoomSize: 3,
  maxRoomSize: 8,
} as const;

/** Padding kept between logical rooms grown inside the cave */
export const CELLULAR_ROOM_PADDING = 1;

/** Order in which a growing room tries each side */
export const GROWTH_DIRECTIONS = ["east", "south", "west", "north"] as const;

export type GrowthDirection = (typeof GROWTH_DIRECTIONS)[number];

// =============================================================================
// PASS IDS
// =============================================================================

export const CELLULAR_CAVE_PASS = "cellular.carve-cave";
export const CELLULAR_ROOMS_PASS = "cellular.grow-rooms";
