import { z } from "zod";
import { AREA_THEMES, LAYOUT_ALGORITHMS } from "../types/area";

const DensitySchema = z
  .number()
  .min(0, { error: "Density must be within [0, 1]" })
  .max(1, { error: "Density must be within [0, 1]" });

const PositiveIntSchema = z
  .number()
  .int("Value must be an integer")
  .min(1, { error: "Value must be positive" });

const NonNegativeIntSchema = z
  .number()
  .int("Value must be an integer")
  .min(0, { error: "Value must not be negative" });

const UINT32_MAX = 0xffffffff;

export const SeedSchema = z
  .number()
  .int("Seed must be an integer")
  .min(0, { message: "Seed must be non-negative" })
  .max(UINT32_MAX, { message: "Seed must fit in uint32" });

export const BSPParamsSchema = z
  .object({
    minLeafSize: z.number().int().min(3),
    maxDepth: z.number().int().min(1).max(16),
    minRoomSize: PositiveIntSchema,
    roomPadding: NonNegativeIntSchema,
    minRoomCount: PositiveIntSchema,
  })
  .partial();

export const CellularParamsSchema = z
  .object({
    fillProbability: DensitySchema,
    iterations: z.number().int().min(0).max(20),
    birthThreshold: z.number().int().min(0).max(8),
    minPlayableArea: PositiveIntSchema,
    maxRetries: z.number().int().min(0).max(50),
    targetRoomCount: PositiveIntSchema,
    minRoomSize: PositiveIntSchema,
    maxRoomSize: PositiveIntSchema,
  })
  .partial();

export const SimpleParamsSchema = z
  .object({
    targetRoomCount: PositiveIntSchema,
    minRoomSize: PositiveIntSchema,
    maxRoomSize: PositiveIntSchema,
    padding: NonNegativeIntSchema,
    maxAttempts: PositiveIntSchema,
  })
  .partial();

export const AreaTemplateSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: z.string().optional(),
    theme: z.enum(AREA_THEMES),
    algorithm: z.enum(LAYOUT_ALGORITHMS),
    width: z.number().int("Width must be an integer").min(5).max(512),
    height: z.number().int("Height must be an integer").min(5).max(512),
    monsterDensity: DensitySchema,
    treasureDensity: DensitySchema,
    trapDensity: DensitySchema,
    recommendedLevel: PositiveIntSchema,
    bsp: BSPParamsSchema.optional(),
    cellular: CellularParamsSchema.optional(),
    simple: SimpleParamsSchema.optional(),
  })
  .superRefine((data, ctx) => {
    const cellular = data.cellular;
    if (
      cellular?.minRoomSize !== undefined &&
      cellular.maxRoomSize !== undefined &&
      cellular.minRoomSize > cellular.maxRoomSize
    ) {
      ctx.addIssue({
        code: "custom",
        message: "Minimum room size must be ≤ maximum room size",
        path: ["cellular", "minRoomSize"],
      });
    }
    const simple = data.simple;
    if (
      simple?.minRoomSize !== undefined &&
      simple.maxRoomSize !== undefined &&
      simple.minRoomSize > simple.maxRoomSize
    ) {
      ctx.addIssue({
        code: "custom",
        message: "Minimum room size must be ≤ maximum room size",
        path: ["simple", "minRoomSize"],
      });
    }
  });

export type BSPParams = z.infer<typeof BSPParamsSchema>;
export type CellularParams = z.infer<typeof CellularParamsSchema>;
export type SimpleParams = z.infer<typeof SimpleParamsSchema>;
export type AreaTemplate = z.infer<typeof AreaTemplateSchema>;
