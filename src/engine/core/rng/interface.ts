/**
 * Interface for random sources used by tray generation.
 * Production uses a seeded generator; tests use fixed sequences.
 */
export type RandomGenerator = {
  /**
   * Draw an integer in [0, maxExclusive).
   * Returns the value and a new generator state (immutable pattern)
   */
  nextInt(maxExclusive: number): {
    value: number;
    newRng: RandomGenerator;
  };
};

export function assertRange(maxExclusive: number): void {
  if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
    throw new Error("maxExclusive must be a positive integer");
  }
}
