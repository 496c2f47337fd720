/**
 * Procedural Area Generation
 *
 * Seeded, deterministic layouts (BSP, cellular automata, random rooms),
 * populated with encounters and flavor text.
 *
 * @example
 * ```typescript
 * import { generateArea, renderAscii } from "@wyrmhold/procgen";
 *
 * const result = generateArea("dungeon", 12345);
 * if (result.isOk()) {
 *   console.log(renderAscii(result.value.map));
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Map model
export * from "./model";
// Narrative
export * from "./narrative";
// Pass Library
export * from "./passes";
// Pipeline
export * from "./pipeline";
// Themes
export * from "./themes";
// Utilities
export * from "./utils";
// Validation
export * from "./validation";
// High-level API
export * from "./api";
