/**
 * Templated room descriptions from theme vocabulary.
 */

import type { Room } from "../model/room";
import type { ThemeVocabulary } from "../themes/catalog";

export interface RoomDescription {
  readonly roomId: number;
  readonly text: string;
}

const ROLE_SENTENCES = {
  spawn: " The way in opens here.",
  boss: " Something powerful guards this place.",
  normal: "",
} as const;

/**
 * Word at `index`, wrapping around the list
 */
export function pickWord(words: readonly [string, ...string[]], index: number): string {
  return words[index % words.length] ?? words[0];
}

export function withArticle(word: string): string {
  return `${/^[aeiou]/i.test(word) ? "An" : "A"} ${word}`;
}

/**
 * "<A|An> <adjective> <roomNoun> spans <w> by <h> paces of <tileNoun>."
 * followed by a role sentence for the spawn and boss rooms. Words are
 * picked by room id, so the text depends only on the room.
 */
export function describeRoom(room: Room, vocabulary: ThemeVocabulary): string {
  const adjective = pickWord(vocabulary.adjectives, room.id);
  const roomNoun = pickWord(vocabulary.roomNouns, room.id);
  const tileNoun = pickWord(vocabulary.tileNouns, room.id);

  return (
    `${withArticle(adjective)} ${roomNoun} spans ${room.width} by ${room.height} paces of ${tileNoun}.` +
    ROLE_SENTENCES[room.type]
  );
}

export function describeRooms(
  rooms: readonly Room[],
  vocabulary: ThemeVocabulary,
): RoomDescription[] {
  return rooms.map((room) => ({
    roomId: room.id,
    text: describeRoom(room, vocabulary),
  }));
}
