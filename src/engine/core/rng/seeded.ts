import { type RandomGenerator, assertRange } from "./interface";

// Simple seedable RNG state
export type SeededRngState = {
  seed: string;
  internalSeed: number;
};

// Create initial RNG state
export function createRngState(seed = "default"): SeededRngState {
  return {
    internalSeed: hashString(seed),
    seed,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
export function hashString(str: string): number {
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

export function nextInt(
  state: SeededRngState,
  maxExclusive: number,
): { value: number; newState: SeededRngState } {
  assertRange(maxExclusive);
  const internalSeed = nextRandom(state.internalSeed);
  // Use high bits mapped to [0, max) to reduce modulo bias
  const value = Math.floor(((internalSeed >>> 0) / 4294967296) * maxExclusive);
  return { newState: { ...state, internalSeed }, value };
}

/**
 * Wrapper class that implements RandomGenerator for SeededRngState
 */
export class SeededRandom implements RandomGenerator {
  constructor(private readonly state: SeededRngState) {}

  nextInt(maxExclusive: number): { value: number; newRng: RandomGenerator } {
    const result = nextInt(this.state, maxExclusive);
    return { newRng: new SeededRandom(result.newState), value: result.value };
  }

  getState(): SeededRngState {
    return this.state;
  }
}

/**
 * Create a new seeded generator with the interface
 */
export function createSeededRandom(seed = "default"): RandomGenerator {
  return new SeededRandom(createRngState(seed));
}
