/**
 * Simple Random Generator
 *
 * Rejection-sampled rooms joined in a chain.
 */

import type { AreaTemplate, SimpleParams } from "@wyrmhold/contracts";
import { PipelineBuilder } from "../../pipeline/builder";
import type {
  EmptyArtifact,
  LayoutArtifact,
  Pipeline,
  Violation,
} from "../../pipeline/types";
import type { LayoutGenerator } from "../types";
import {
  ATTEMPTS_PER_ROOM,
  DEFAULT_SIMPLE_PARAMS,
  MAP_BORDER,
} from "./constants";
import { placeRandomRooms } from "./passes";

export interface ResolvedSimpleParams {
  readonly targetRoomCount: number;
  readonly minRoomSize: number;
  /** Already clamped to the map interior */
  readonly maxRoomSize: number;
  readonly padding: number;
  readonly maxAttempts: number;
}

/**
 * Merge the template's `simple` block over the defaults. The maximum room
 * size is clamped so a room always fits inside the map border.
 */
export function resolveSimpleParams(template: AreaTemplate): ResolvedSimpleParams {
  const params: SimpleParams = template.simple ?? {};
  const targetRoomCount =
    params.targetRoomCount ?? DEFAULT_SIMPLE_PARAMS.targetRoomCount;
  const interior =
    Math.min(template.width, template.height) - MAP_BORDER * 2;

  return {
    targetRoomCount,
    minRoomSize: params.minRoomSize ?? DEFAULT_SIMPLE_PARAMS.minRoomSize,
    maxRoomSize: Math.min(
      params.maxRoomSize ?? DEFAULT_SIMPLE_PARAMS.maxRoomSize,
      interior,
    ),
    padding: params.padding ?? DEFAULT_SIMPLE_PARAMS.padding,
    maxAttempts: params.maxAttempts ?? targetRoomCount * ATTEMPTS_PER_ROOM,
  };
}

export function validateSimpleParams(
  params: ResolvedSimpleParams,
  width: number,
  height: number,
): Violation[] {
  const violations: Violation[] = [];

  if (params.minRoomSize > params.maxRoomSize) {
    violations.push({
      type: "simple.roomSize",
      message: `minRoomSize ${params.minRoomSize} does not fit between ${MAP_BORDER}-tile borders of a ${width}x${height} map (max ${params.maxRoomSize})`,
      severity: "error",
    });
  }

  return violations;
}

export function createSimplePipeline(
  params: ResolvedSimpleParams,
): Pipeline<EmptyArtifact, LayoutArtifact> {
  return PipelineBuilder.create<EmptyArtifact>("simple_random")
    .pipe(placeRandomRooms(params))
    .build();
}

export const simpleGenerator: LayoutGenerator = {
  algorithm: "simple_random",

  validate(template) {
    return validateSimpleParams(
      resolveSimpleParams(template),
      template.width,
      template.height,
    );
  },

  layoutRules(template) {
    return {
      rectangular: true,
      roomPadding: resolveSimpleParams(template).padding,
    };
  },

  createPipeline(template) {
    return createSimplePipeline(resolveSimpleParams(template));
  },
};
