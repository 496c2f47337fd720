/**
 * Generation API
 *
 * High-level entry points: seed + template in, populated map out.
 */

import {
  AreaTemplateSchema,
  type AreaTemplate,
  type AreaTheme,
  Err,
  GenerationError,
  type GenerationWarning,
  InvalidParameterError,
  Ok,
  type Result,
  SeededRandom,
  SeedSchema,
} from "@wyrmhold/contracts";
import { getGenerator } from "./generators";
import { DungeonMap } from "./model/dungeon-map";
import { type AreaContent, deriveContent } from "./narrative";
import {
  type ContentAssignment,
  populateContent,
} from "./passes/content/populate-content";
import { createTraceCollector } from "./pipeline/trace";
import { createEmptyArtifact, type TraceEvent } from "./pipeline/types";
import { type AreaTemplateOverrides, createAreaTemplate } from "./themes/catalog";

/**
 * Generation options
 */
export interface GenerateOptions {
  /**
   * Record pass start/end, decisions and warnings.
   * Default: false
   */
  readonly trace?: boolean;
}

/**
 * A successfully generated area
 */
export interface GeneratedArea {
  readonly map: DungeonMap;
  readonly content: AreaContent;
  readonly assignment: ContentAssignment;
  /** Soft signals, e.g. fewer rooms placed than requested */
  readonly warnings: readonly GenerationWarning[];
  /** Empty unless `trace` was requested */
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Check a seed and template without consuming any randomness.
 * Returns the parsed template on success.
 */
export function validateTemplate(
  seed: unknown,
  template: unknown,
): Result<AreaTemplate, InvalidParameterError> {
  const seedResult = SeedSchema.safeParse(seed);
  if (!seedResult.success) {
    return Err(
      new InvalidParameterError(`Invalid seed: ${String(seed)}`, {
        field: "seed",
        issues: seedResult.error.issues.map((issue) => issue.message),
      }),
    );
  }

  const parsed = AreaTemplateSchema.safeParse(template);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join("; ");
    return Err(
      new InvalidParameterError(`Invalid area template: ${summary}`, {
        issues,
      }),
    );
  }

  const violations = getGenerator(parsed.data.algorithm)
    .validate(parsed.data)
    .filter((violation) => violation.severity === "error");
  if (violations.length > 0) {
    return Err(
      new InvalidParameterError(
        `Invalid ${parsed.data.algorithm} parameters: ${violations
          .map((v) => v.message)
          .join("; ")}`,
        { violations },
      ),
    );
  }

  return Ok(parsed.data);
}

/**
 * Generate a populated area.
 *
 * Validation runs first, so bad input fails with InvalidParameterError
 * before any randomness is consumed. One SeededRandom then drives the
 * layout pipeline and the content populator, in that order.
 *
 * Only GenerationError is returned as Err; anything else is a bug and is
 * rethrown.
 *
 * @example
 * ```typescript
 * const result = generate(42, createAreaTemplate("dungeon"));
 * result.match(
 *   (area) => console.log(`${area.map.rooms.length} rooms`),
 *   (error) => console.error(error.code, error.message),
 * );
 * ```
 */
export function generate(
  seed: number,
  template: AreaTemplate,
  options: GenerateOptions = {},
): Result<GeneratedArea, GenerationError> {
  const validated = validateTemplate(seed, template);
  if (validated.isErr()) {
    return Err(validated.error);
  }
  const parsedTemplate = validated.value;

  const trace = createTraceCollector(options.trace ?? false);
  const rng = new SeededRandom(seed);
  const pipeline = getGenerator(parsedTemplate.algorithm).createPipeline(
    parsedTemplate,
  );

  try {
    const { artifact, durationMs } = pipeline.run(
      createEmptyArtifact(parsedTemplate.width, parsedTemplate.height),
      { rng, trace, template: parsedTemplate },
    );

    const map = new DungeonMap({
      grid: artifact.grid,
      rooms: artifact.rooms,
      corridors: artifact.corridors,
      seed,
      template: parsedTemplate,
    });
    const assignment = populateContent(map, rng, trace);

    return Ok({
      map,
      content: deriveContent(map),
      assignment,
      warnings: artifact.warnings,
      trace: trace.getEvents(),
      durationMs,
    });
  } catch (error) {
    if (GenerationError.isGenerationError(error)) {
      return Err(error);
    }
    throw error;
  }
}

/**
 * Generate an area from a theme's catalog defaults
 *
 * @example
 * ```typescript
 * const cave = generateArea("cave", 7, { width: 64, height: 40 });
 * ```
 */
export function generateArea(
  theme: AreaTheme,
  seed: number,
  overrides: AreaTemplateOverrides = {},
  options: GenerateOptions = {},
): Result<GeneratedArea, GenerationError> {
  return generate(seed, createAreaTemplate(theme, overrides), options);
}
