import { type Seed, createSeed, seedAsString } from "../../../types/brands";

import { type TileRandomGenerator } from "./interface";

// Simple seedable RNG state
export type SeededRng = {
  seed: Seed;
  internalSeed: number;
};

// Create initial RNG state
export function createRng(seed = "default"): SeededRng {
  const branded = createSeed(seed);
  return {
    internalSeed: hashString(seedAsString(branded)),
    seed: branded,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

export function nextFloat(rng: SeededRng): {
  value: number;
  newRng: SeededRng;
} {
  const internalSeed = nextRandom(rng.internalSeed);
  return {
    newRng: { ...rng, internalSeed },
    value: (internalSeed >>> 0) / 4294967296,
  };
}

/**
 * Wrapper class that implements TileRandomGenerator interface for SeededRng
 */
export class SeededRngImpl implements TileRandomGenerator {
  constructor(private readonly state: SeededRng) {}

  nextFloat(): { value: number; newRng: TileRandomGenerator } {
    const result = nextFloat(this.state);
    return {
      newRng: new SeededRngImpl(result.newRng),
      value: result.value,
    };
  }

  getState(): SeededRng {
    return this.state;
  }
}

/**
 * Create a new seeded generator with the interface
 */
export function createSeededRng(seed = "default"): TileRandomGenerator {
  return new SeededRngImpl(createRng(seed));
}
