/**
 * BSP Generator
 *
 * Recursive binary space partitioning with one room per leaf.
 */

import type { AreaTemplate, BSPParams } from "@wyrmhold/contracts";
import { PipelineBuilder } from "../../pipeline/builder";
import type {
  EmptyArtifact,
  LayoutArtifact,
  Pipeline,
  Violation,
} from "../../pipeline/types";
import type { LayoutGenerator } from "../types";
import { DEFAULT_BSP_PARAMS } from "./constants";
import { connectSubtrees, partition, placeRooms } from "./passes";

export interface ResolvedBSPParams {
  readonly minLeafSize: number;
  readonly maxDepth: number;
  readonly minRoomSize: number;
  readonly roomPadding: number;
  readonly minRoomCount: number;
}

/**
 * Merge the template's `bsp` block over the defaults
 */
export function resolveBSPParams(template: AreaTemplate): ResolvedBSPParams {
  const params: BSPParams = template.bsp ?? {};
  return {
    minLeafSize: params.minLeafSize ?? DEFAULT_BSP_PARAMS.minLeafSize,
    maxDepth: params.maxDepth ?? DEFAULT_BSP_PARAMS.maxDepth,
    minRoomSize: params.minRoomSize ?? DEFAULT_BSP_PARAMS.minRoomSize,
    roomPadding: params.roomPadding ?? DEFAULT_BSP_PARAMS.roomPadding,
    minRoomCount: params.minRoomCount ?? DEFAULT_BSP_PARAMS.minRoomCount,
  };
}

/**
 * Cross-field checks the schema cannot express.
 */
export function validateBSPParams(
  params: ResolvedBSPParams,
  width: number,
  height: number,
): Violation[] {
  const violations: Violation[] = [];
  const paddedRoom = params.minRoomSize + params.roomPadding * 2;

  if (params.minLeafSize < paddedRoom) {
    violations.push({
      type: "bsp.minLeafSize",
      message: `minLeafSize ${params.minLeafSize} cannot hold a room of ${params.minRoomSize} with padding ${params.roomPadding} (needs ${paddedRoom})`,
      severity: "error",
    });
  }

  if (width < paddedRoom || height < paddedRoom) {
    violations.push({
      type: "bsp.mapSize",
      message: `A ${width}x${height} map cannot hold a padded room of ${paddedRoom}`,
      severity: "error",
    });
  }

  return violations;
}

export function createBSPPipeline(
  params: ResolvedBSPParams,
): Pipeline<EmptyArtifact, LayoutArtifact> {
  return PipelineBuilder.create<EmptyArtifact>("bsp")
    .pipe(partition(params))
    .pipe(placeRooms(params))
    .pipe(connectSubtrees())
    .build();
}

export const bspGenerator: LayoutGenerator = {
  algorithm: "bsp",

  validate(template) {
    return validateBSPParams(
      resolveBSPParams(template),
      template.width,
      template.height,
    );
  },

  layoutRules(template) {
    return {
      rectangular: true,
      roomPadding: resolveBSPParams(template).roomPadding,
    };
  },

  createPipeline(template) {
    return createBSPPipeline(resolveBSPParams(template));
  },
};
