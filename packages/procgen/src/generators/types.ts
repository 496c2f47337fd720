import type { AreaTemplate, LayoutAlgorithm } from "@wyrmhold/contracts";
import type {
  EmptyArtifact,
  LayoutArtifact,
  Pipeline,
  Violation,
} from "../pipeline/types";

/**
 * Geometric guarantees a generator makes about its rooms
 */
export interface LayoutRules {
  /** Rooms are carved rectangles and every floor tile is room or corridor */
  readonly rectangular: boolean;
  /** Padding under which no two rooms intersect */
  readonly roomPadding: number;
}

/**
 * Layout strategy selected by `AreaTemplate.algorithm`.
 */
export interface LayoutGenerator {
  readonly algorithm: LayoutAlgorithm;
  /**
   * Cross-field parameter checks, run before any randomness is consumed
   */
  validate(template: AreaTemplate): readonly Violation[];
  layoutRules(template: AreaTemplate): LayoutRules;
  createPipeline(template: AreaTemplate): Pipeline<EmptyArtifact, LayoutArtifact>;
}
