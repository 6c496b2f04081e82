import { randomInt as cryptoRandomInt } from "node:crypto";
import type { RunSeed, Seed } from "../contract/types.js";

/**
 * Mulberry32, a seedable 32-bit PRNG.
 * Returns a function that produces numbers in [0, 1).
 *
 * DO NOT use Math.random on any simulation-critical path.
 * Always use a seeded RNG obtained from this module.
 */
export function createRng(seed: Seed): () => number {
  let s = seed | 0;
  return (): number => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded random integer in [min, max] (inclusive). */
export function randomInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/** Derive a child seed from a parent RNG stream. */
export function deriveSeed(rng: () => number): Seed {
  return (rng() * 4294967296) | 0;
}

// ---------------------------------------------------------------------------
// Run / floor seeding
// ---------------------------------------------------------------------------

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * FNV-1a over the UTF-8 bytes of `text`, as a signed 32-bit integer.
 * Byte-oriented so the value does not depend on the host's string encoding.
 */
export function hashSeedString(text: string): Seed {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of new TextEncoder().encode(text)) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash | 0;
}

/** Strings are hashed; integers are taken verbatim (as their 32-bit view). */
export function normalizeRunSeed(seed: RunSeed): Seed {
  if (typeof seed === "string") {
    return hashSeedString(seed);
  }
  return seed | 0;
}

/** `runSeed XOR floorIndex`. Floor 0 leaves the run seed unchanged. */
export function combineSeed(runSeed: RunSeed, floorIndex: number): Seed {
  return normalizeRunSeed(runSeed) ^ floorIndex;
}

export interface WeightedEntry<T> {
  value: T;
  weight: number;
}

/**
 * A single deterministic stream with the draw kinds the simulation needs.
 * Every draw goes through the same underlying generator, so two streams built
 * from the same seed stay in lockstep regardless of which draw kinds are mixed.
 */
export interface SeededStream {
  readonly seed: Seed;
  float(): number;
  int(min: number, max: number): number;
  /** Fisher–Yates on a copy of `items`. */
  shuffle<T>(items: readonly T[]): T[];
  /** Uniform pick; `undefined` for an empty list. */
  pick<T>(items: readonly T[]): T | undefined;
  /** Weighted pick; non-positive weights never win. `undefined` if nothing can win. */
  weightedPick<T>(entries: readonly WeightedEntry<T>[]): T | undefined;
  deriveSeed(): Seed;
}

export function createSeededStream(seed: Seed): SeededStream {
  const rng = createRng(seed);
  return {
    seed,
    float: () => rng(),
    int: (min, max) => randomInt(rng, min, max),
    shuffle<T>(items: readonly T[]): T[] {
      const result = [...items];
      for (let i = result.length - 1; i > 0; i--) {
        const j = randomInt(rng, 0, i);
        const swap = result[i];
        result[i] = result[j];
        result[j] = swap;
      }
      return result;
    },
    pick<T>(items: readonly T[]): T | undefined {
      if (items.length === 0) {
        return undefined;
      }
      return items[randomInt(rng, 0, items.length - 1)];
    },
    weightedPick<T>(entries: readonly WeightedEntry<T>[]): T | undefined {
      const eligible = entries.filter((entry) => entry.weight > 0);
      const total = eligible.reduce((sum, entry) => sum + entry.weight, 0);
      if (eligible.length === 0 || total <= 0) {
        return undefined;
      }
      let roll = rng() * total;
      for (const entry of eligible) {
        roll -= entry.weight;
        if (roll < 0) {
          return entry.value;
        }
      }
      return eligible[eligible.length - 1].value;
    },
    deriveSeed: () => deriveSeed(rng),
  };
}

/** The per-floor stream. Consumed only by generation and guard initialization. */
export function createFloorStream(runSeed: RunSeed, floorIndex: number): SeededStream {
  return createSeededStream(combineSeed(runSeed, floorIndex));
}

/**
 * A fresh, non-reproducible run seed for runs started without one.
 * Drawn from the OS entropy pool; never touches a floor stream.
 */
export function createCosmeticSeed(): Seed {
  return cryptoRandomInt(1, 2 ** 31 - 1);
}
