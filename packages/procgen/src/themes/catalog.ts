/**
 * Area Theme Catalog
 *
 * Static theme configuration: display text, preferred layout algorithm,
 * default densities, recommended level and flavor vocabulary.
 */

import {
  AREA_THEMES,
  type AreaTemplate,
  type AreaTheme,
  type LayoutAlgorithm,
} from "@wyrmhold/contracts";
import { z } from "zod";
import { DEFAULT_AREA_HEIGHT, DEFAULT_AREA_WIDTH } from "../core/constants";
import vocabularyData from "./vocabulary.json";

const WordListSchema = z.tuple([z.string().min(1)], z.string().min(1));

export const ThemeVocabularySchema = z.object({
  adjectives: WordListSchema,
  roomNouns: WordListSchema,
  tileNouns: WordListSchema,
  creatures: WordListSchema,
  treasures: WordListSchema,
});

export type ThemeVocabulary = z.infer<typeof ThemeVocabularySchema>;

const VocabularyCatalogSchema = z.record(
  z.enum(AREA_THEMES),
  ThemeVocabularySchema,
);

const VOCABULARY = VocabularyCatalogSchema.parse(vocabularyData);

export interface ThemeDefinition {
  readonly theme: AreaTheme;
  readonly name: string;
  readonly description: string;
  readonly algorithm: LayoutAlgorithm;
  readonly monsterDensity: number;
  readonly treasureDensity: number;
  readonly trapDensity: number;
  readonly recommendedLevel: number;
  readonly vocabulary: ThemeVocabulary;
}

type ThemeSettings = Omit<ThemeDefinition, "theme" | "vocabulary">;

const THEME_SETTINGS: Record<AreaTheme, ThemeSettings> = {
  dungeon: {
    name: "Dungeon",
    description: "A dark underground dungeon with stone walls",
    algorithm: "bsp",
    monsterDensity: 0.6,
    treasureDensity: 0.3,
    trapDensity: 0.3,
    recommendedLevel: 1,
  },
  cave: {
    name: "Cave",
    description: "A natural limestone cave with organic passages",
    algorithm: "cellular",
    monsterDensity: 0.4,
    treasureDensity: 0.2,
    trapDensity: 0.1,
    recommendedLevel: 2,
  },
  forest: {
    name: "Forest",
    description: "A dense magical forest with twisted paths",
    algorithm: "simple_random",
    monsterDensity: 0.3,
    treasureDensity: 0.2,
    trapDensity: 0.1,
    recommendedLevel: 1,
  },
  ruins: {
    name: "Ancient Ruins",
    description: "Crumbling ancient structures overgrown with nature",
    algorithm: "bsp",
    monsterDensity: 0.5,
    treasureDensity: 0.4,
    trapDensity: 0.2,
    recommendedLevel: 3,
  },
  castle: {
    name: "Castle",
    description: "An imposing fortress with fortified halls",
    algorithm: "bsp",
    monsterDensity: 0.7,
    treasureDensity: 0.3,
    trapDensity: 0.2,
    recommendedLevel: 5,
  },
  temple: {
    name: "Temple",
    description: "A sacred temple with mystical architecture",
    algorithm: "cellular",
    monsterDensity: 0.4,
    treasureDensity: 0.5,
    trapDensity: 0.3,
    recommendedLevel: 4,
  },
  sewers: {
    name: "Sewers",
    description: "Disgusting underground sewage tunnels",
    algorithm: "cellular",
    monsterDensity: 0.5,
    treasureDensity: 0.1,
    trapDensity: 0.2,
    recommendedLevel: 2,
  },
  underground_city: {
    name: "Underground City",
    description: "An ancient dwarven city deep below the surface",
    algorithm: "simple_random",
    monsterDensity: 0.3,
    treasureDensity: 0.4,
    trapDensity: 0.1,
    recommendedLevel: 6,
  },
};

function defineTheme(theme: AreaTheme): ThemeDefinition {
  return { theme, ...THEME_SETTINGS[theme], vocabulary: VOCABULARY[theme] };
}

export const THEME_CATALOG: Readonly<Record<AreaTheme, ThemeDefinition>> =
  Object.freeze({
    dungeon: defineTheme("dungeon"),
    cave: defineTheme("cave"),
    forest: defineTheme("forest"),
    ruins: defineTheme("ruins"),
    castle: defineTheme("castle"),
    temple: defineTheme("temple"),
    sewers: defineTheme("sewers"),
    underground_city: defineTheme("underground_city"),
  });

export function getTheme(theme: AreaTheme): ThemeDefinition {
  return THEME_CATALOG[theme];
}

export type AreaTemplateOverrides = Partial<Omit<AreaTemplate, "theme">>;

/**
 * Build a template from the catalog defaults for a theme.
 * The result is validated later by `generate`, not here.
 *
 * @example
 * ```typescript
 * const template = createAreaTemplate("cave", { width: 64, height: 40 });
 * ```
 */
export function createAreaTemplate(
  theme: AreaTheme,
  overrides: AreaTemplateOverrides = {},
): AreaTemplate {
  const definition = getTheme(theme);
  return {
    name: definition.name,
    description: definition.description,
    theme,
    algorithm: definition.algorithm,
    width: DEFAULT_AREA_WIDTH,
    height: DEFAULT_AREA_HEIGHT,
    monsterDensity: definition.monsterDensity,
    treasureDensity: definition.treasureDensity,
    trapDensity: definition.trapDensity,
    recommendedLevel: definition.recommendedLevel,
    ...overrides,
  };
}
