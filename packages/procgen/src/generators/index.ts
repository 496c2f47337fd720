/**
 * Layout generators, selected by `AreaTemplate.algorithm`.
 */

import type { LayoutAlgorithm } from "@wyrmhold/contracts";
import { bspGenerator } from "./bsp";
import { cellularGenerator } from "./cellular";
import { simpleGenerator } from "./simple";
import type { LayoutGenerator } from "./types";

/**
 * Generator registry
 */
export const generators: Readonly<Record<LayoutAlgorithm, LayoutGenerator>> = {
  bsp: bspGenerator,
  cellular: cellularGenerator,
  simple_random: simpleGenerator,
};

export function getGenerator(algorithm: LayoutAlgorithm): LayoutGenerator {
  return generators[algorithm];
}

export * from "./bsp";
export * from "./cellular";
export * from "./simple";
export type { LayoutGenerator, LayoutRules } from "./types";
