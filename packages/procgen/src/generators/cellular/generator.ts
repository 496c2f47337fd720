/**
 * Cellular Automata Generator
 *
 * Organic caves: random fill, smoothing, largest-region pruning, then
 * logical rooms grown inside the cave.
 */

import type { AreaTemplate, CellularParams } from "@wyrmhold/contracts";
import { PipelineBuilder } from "../../pipeline/builder";
import type {
  EmptyArtifact,
  LayoutArtifact,
  Pipeline,
  Violation,
} from "../../pipeline/types";
import type { LayoutGenerator } from "../types";
import {
  CELLULAR_ROOM_PADDING,
  DEFAULT_CELLULAR_PARAMS,
  DEFAULT_MIN_PLAYABLE_RATIO,
} from "./constants";
import { carveCave, growRooms } from "./passes";

export interface ResolvedCellularParams {
  readonly fillProbability: number;
  readonly iterations: number;
  readonly birthThreshold: number;
  readonly minPlayableArea: number;
  readonly maxRetries: number;
  readonly targetRoomCount: number;
  readonly minRoomSize: number;
  readonly maxRoomSize: number;
}

export function defaultMinPlayableArea(width: number, height: number): number {
  return Math.max(1, Math.floor(width * height * DEFAULT_MIN_PLAYABLE_RATIO));
}

/**
 * Merge the template's `cellular` block over the defaults
 */
export function resolveCellularParams(
  template: AreaTemplate,
): ResolvedCellularParams {
  const params: CellularParams = template.cellular ?? {};
  const defaults = DEFAULT_CELLULAR_PARAMS;
  return {
    fillProbability: params.fillProbability ?? defaults.fillProbability,
    iterations: params.iterations ?? defaults.iterations,
    birthThreshold: params.birthThreshold ?? defaults.birthThreshold,
    minPlayableArea:
      params.minPlayableArea ??
      defaultMinPlayableArea(template.width, template.height),
    maxRetries: params.maxRetries ?? defaults.maxRetries,
    targetRoomCount: params.targetRoomCount ?? defaults.targetRoomCount,
    minRoomSize: params.minRoomSize ?? defaults.minRoomSize,
    maxRoomSize: params.maxRoomSize ?? defaults.maxRoomSize,
  };
}

export function validateCellularParams(
  params: ResolvedCellularParams,
  width: number,
  height: number,
): Violation[] {
  const violations: Violation[] = [];

  if (params.minRoomSize > params.maxRoomSize) {
    violations.push({
      type: "cellular.roomSize",
      message: `minRoomSize ${params.minRoomSize} exceeds maxRoomSize ${params.maxRoomSize}`,
      severity: "error",
    });
  }

  if (params.minPlayableArea > width * height) {
    violations.push({
      type: "cellular.minPlayableArea",
      message: `minPlayableArea ${params.minPlayableArea} exceeds the ${width}x${height} map`,
      severity: "error",
    });
  }

  return violations;
}

export function createCellularPipeline(
  params: ResolvedCellularParams,
): Pipeline<EmptyArtifact, LayoutArtifact> {
  return PipelineBuilder.create<EmptyArtifact>("cellular")
    .pipe(carveCave(params))
    .pipe(growRooms(params))
    .build();
}

export const cellularGenerator: LayoutGenerator = {
  algorithm: "cellular",

  validate(template) {
    return validateCellularParams(
      resolveCellularParams(template),
      template.width,
      template.height,
    );
  },

  layoutRules() {
    return { rectangular: false, roomPadding: CELLULAR_ROOM_PADDING };
  },

  createPipeline(template) {
    return createCellularPipeline(resolveCellularParams(template));
  },
};
