import { describe, expect, it } from "vitest";
import { AreaTemplateSchema, SeedSchema } from "../src";

const validTemplate = {
  theme: "dungeon",
  algorithm: "bsp",
  width: 40,
  height: 40,
  monsterDensity: 0.5,
  treasureDensity: 0.3,
  trapDensity: 0.2,
  recommendedLevel: 1,
};

describe("AreaTemplateSchema", () => {
  it("accepts a minimal valid template", () => {
    const res = AreaTemplateSchema.safeParse(validTemplate);
    expect(res.success).toBe(true);
  });

  it("accepts per-algorithm parameter blocks", () => {
    const res = AreaTemplateSchema.safeParse({
      ...validTemplate,
      bsp: { minLeafSize: 6, maxDepth: 4 },
      cellular: { fillProbability: 0, maxRetries: 2 },
      simple: { targetRoomCount: 50, padding: 2 },
    });
    expect(res.success).toBe(true);
  });

  it("rejects density outside [0, 1]", () => {
    const res = AreaTemplateSchema.safeParse({
      ...validTemplate,
      monsterDensity: 1.5,
    });
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.issues[0]?.path).toEqual(["monsterDensity"]);
    }
  });

  it("rejects negative dimensions", () => {
    const res = AreaTemplateSchema.safeParse({ ...validTemplate, width: -10 });
    expect(res.success).toBe(false);
  });

  it("rejects a non-positive recommended level", () => {
    const res = AreaTemplateSchema.safeParse({
      ...validTemplate,
      recommendedLevel: 0,
    });
    expect(res.success).toBe(false);
  });

  it("rejects an unknown theme", () => {
    const res = AreaTemplateSchema.safeParse({
      ...validTemplate,
      theme: "volcano",
    });
    expect(res.success).toBe(false);
  });

  it("rejects a non-positive room count", () => {
    const res = AreaTemplateSchema.safeParse({
      ...validTemplate,
      algorithm: "simple_random",
      simple: { targetRoomCount: 0 },
    });
    expect(res.success).toBe(false);
  });

  it("rejects inverted room size ranges", () => {
    const res = AreaTemplateSchema.safeParse({
      ...validTemplate,
      simple: { minRoomSize: 8, maxRoomSize: 4 },
    });
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.issues[0]?.path).toEqual(["simple", "minRoomSize"]);
    }
  });
});

describe("SeedSchema", () => {
  it("accepts the uint32 range", () => {
    expect(SeedSchema.safeParse(0).success).toBe(true);
    expect(SeedSchema.safeParse(42).success).toBe(true);
    expect(SeedSchema.safeParse(0xffffffff).success).toBe(true);
  });

  it("rejects seeds outside the uint32 range", () => {
    expect(SeedSchema.safeParse(-7).success).toBe(false);
    expect(SeedSchema.safeParse(2 ** 32).success).toBe(false);
  });

  it("rejects fractional seeds", () => {
    expect(SeedSchema.safeParse(1.5).success).toBe(false);
  });
});
