/**
 * Core primitives: geometry, grid, hashing.
 */

export * from "./constants";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
