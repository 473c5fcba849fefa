// Branded primitive types for type safety and domain modeling

// Duration in milliseconds - for animation/reset delays
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// RNG seed - for random number generator seeding
declare const SeedBrand: unique symbol;
export type Seed = string & { readonly [SeedBrand]: true };

export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function createSeed(value: string): Seed {
  if (value.length === 0) {
    throw new Error("Seed must be a non-empty string");
  }
  return value as Seed;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

export function assertDurationMs(n: unknown): asserts n is DurationMs {
  if (!isDurationMs(n)) throw new Error("Not a valid DurationMs");
}

export function isSeed(s: unknown): s is Seed {
  return typeof s === "string" && s.length > 0;
}

export function assertSeed(s: unknown): asserts s is Seed {
  if (!isSeed(s)) throw new Error("Not a valid Seed");
}

// Conversion helpers for interop at boundaries
export const durationMsAsNumber = (d: DurationMs): number => d as number;
export const seedAsString = (s: Seed): string => s as string;
