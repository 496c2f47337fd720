/**
 * Geometry module - types and operations for 2D geometry.
 */

export * from "./operations";
export * from "./types";
