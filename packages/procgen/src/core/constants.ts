/**
 * Core Constants
 *
 * Named constants shared across generation stages.
 */

// =============================================================================
// CONTENT
// =============================================================================

/** Tile area that one unit of density fills with one feature */
export const FEATURE_AREA_UNIT = 16;

/** Inclusive monster count range for the boss room */
export const BOSS_MONSTER_MIN = 2;
export const BOSS_MONSTER_MAX = 4;

// =============================================================================
// AREA DEFAULTS
// =============================================================================

/** Map size used when an area is built from a theme without overrides */
export const DEFAULT_AREA_WIDTH = 48;
export const DEFAULT_AREA_HEIGHT = 48;
