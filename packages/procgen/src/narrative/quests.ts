/**
 * Area quest generation from fixed templates.
 */

import { SeededRandom } from "@wyrmhold/contracts";
import type { ThemeDefinition } from "../themes/catalog";

export const QUEST_TEMPLATES = [
  "Slay {monster_count} {creatures}",
  "Find the {treasure} of {location}",
  "Rescue {npc} from {location}",
  "Retrieve the {treasure} for {npc}",
  "Explore the depths of {location}",
  "Survive {encounter_count} encounters",
] as const;

export const QUEST_GIVERS = [
  "Brother Aldous",
  "Captain Mirela",
  "Old Tamsin",
  "the Reeve of Harrowby",
  "Sister Yvaine",
  "Dagny the Smith",
] as const;

/** Offset between the map seed and the quest stream */
export const QUEST_SEED_OFFSET = 7919;

export const QUEST_REWARD_PER_DIFFICULTY = 100;

export interface Quest {
  readonly title: string;
  readonly template: string;
  readonly difficulty: number;
  readonly reward: number;
  readonly location: string;
  readonly targetRoomId: number;
}

export interface QuestFacts {
  readonly seed: number;
  readonly theme: ThemeDefinition;
  readonly totalMonsters: number;
  readonly encounterCount: number;
  readonly targetRoomId: number;
}

/**
 * Replace `{key}` placeholders; unknown keys are left as they are
 */
export function fillTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Pick and fill a quest template. Uses its own source derived from the map
 * seed, so the generation stream is untouched.
 */
export function generateQuest(facts: QuestFacts): Quest {
  const rng = new SeededRandom(facts.seed).derive(QUEST_SEED_OFFSET);
  const template = rng.choice(QUEST_TEMPLATES);
  const creatures = rng.choice(facts.theme.vocabulary.creatures);
  const treasure = rng.choice(facts.theme.vocabulary.treasures);
  const npc = rng.choice(QUEST_GIVERS);
  const difficulty = rng.nextInt(1, 10);

  const title = fillTemplate(template, {
    monster_count: String(facts.totalMonsters),
    creatures,
    treasure,
    npc,
    location: facts.theme.name,
    encounter_count: String(facts.encounterCount),
  });

  return {
    title,
    template,
    difficulty,
    reward: difficulty * QUEST_REWARD_PER_DIFFICULTY,
    location: facts.theme.name,
    targetRoomId: facts.targetRoomId,
  };
}
