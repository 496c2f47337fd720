/**
 * Map Checksum Calculator
 *
 * Computes deterministic checksums for generated maps. Two generations with
 * the same seed and template must produce the same checksum.
 *
 * Format: "v{version}:{hash}"
 */

import type { Point, Rect } from "../geometry/types";
import { FNV64Hasher } from "./fnv64";

/**
 * Increment when changing what data is hashed or how.
 */
export const CHECKSUM_VERSION = 1;

/**
 * Parse a versioned checksum into its components.
 * Returns null when the string is not a versioned checksum.
 */
export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{16})$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * The slice of a map the checksum covers
 */
export interface ChecksumInput {
  readonly width: number;
  readonly height: number;
  readonly terrain: Uint8Array;
  readonly rooms: ReadonlyArray<
    Rect & {
      readonly id: number;
      readonly type: string;
      readonly monsters: number;
      readonly treasures: number;
      readonly traps: number;
    }
  >;
  readonly corridors: ReadonlyArray<{
    readonly fromRoomId: number;
    readonly toRoomId: number;
    readonly path: readonly Point[];
  }>;
}

/**
 * Calculate a deterministic checksum covering terrain, rooms, room
 * features and corridor paths.
 */
export function calculateChecksum(input: ChecksumInput): string {
  const hasher = new FNV64Hasher();

  hasher.updateInt32(input.width).updateInt32(input.height);
  hasher.updateBytes(input.terrain);

  hasher.updateInt32(input.rooms.length);
  for (const room of input.rooms) {
    hasher
      .updateInt32(room.id)
      .updateInt32(room.x)
      .updateInt32(room.y)
      .updateInt32(room.width)
      .updateInt32(room.height)
      .updateString(room.type)
      .updateInt32(room.monsters)
      .updateInt32(room.treasures)
      .updateInt32(room.traps);
  }

  hasher.updateInt32(input.corridors.length);
  for (const corridor of input.corridors) {
    hasher
      .updateInt32(corridor.fromRoomId)
      .updateInt32(corridor.toRoomId)
      .updateInt32(corridor.path.length);
    for (const p of corridor.path) {
      hasher.updateInt32(p.x).updateInt32(p.y);
    }
  }

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
