/**
 * Grid module - 2D tile grid and region algorithms.
 */

export * from "./flood-fill";
export { Grid } from "./grid";
export * from "./types";
