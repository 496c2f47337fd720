import { choice, probability, range, shuffle } from "./rng";

/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - 32-bit integer operations only, so sequences match across platforms
 * - Four 32-bit state words seeded through SplitMix32
 * - Floats are the full 32-bit output divided by 2^32, always in [0, 1)
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 *
 * There is no shared instance. Every generator receives its source
 * explicitly, which keeps independent generation calls isolated.
 */

/**
 * SplitMix32 for state initialization from a single seed.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * State type for xoshiro128++ (4 x 32-bit words)
 */
export type RngState = [number, number, number, number];

/** Warm-up rounds discarded after seeding */
const WARMUP_ROUNDS = 8;

export class SeededRandom {
  /** Seed normalized to uint32 */
  readonly seed: number;
  private s: RngState;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    const mix = splitmix32(this.seed);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < WARMUP_ROUNDS; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Next float in [0, 1)
   */
  nextFloat(): number {
    return this.next32() / 0x100000000;
  }

  /**
   * Random integer between low and high (both inclusive)
   */
  nextInt(low: number, high: number): number {
    return range(() => this.nextFloat(), low, high);
  }

  /**
   * Random element of an array
   */
  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.nextFloat(), array);
  }

  /**
   * Fisher-Yates shuffle into a new array
   */
  shuffle<T>(array: readonly T[]): T[] {
    return shuffle(() => this.nextFloat(), array);
  }

  probability(chance: number): boolean {
    return probability(() => this.nextFloat(), chance);
  }

  /**
   * Independent source seeded with `seed + offset`.
   * Used by bounded retries so each attempt sees a fresh sequence.
   */
  derive(offset: number): SeededRandom {
    return new SeededRandom((this.seed + offset) >>> 0);
  }

  /**
   * Save internal state for exact reproduction
   */
  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  /**
   * Restore a state captured with getState()
   */
  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
