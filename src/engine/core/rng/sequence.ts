import { type RandomGenerator, assertRange } from "./interface";

/**
 * RNG that yields a fixed sequence (each value taken modulo the requested
 * range) and then repeats. Each call returns a new instance with an advanced
 * index (immutable style).
 */
export class SequenceRandom implements RandomGenerator {
  constructor(
    private readonly sequence: ReadonlyArray<number>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  nextInt(maxExclusive: number): { value: number; newRng: RandomGenerator } {
    assertRange(maxExclusive);
    const raw = this.sequence[this.index];
    if (raw === undefined) throw new Error("Sequence index out of bounds");
    const nextIndex = (this.index + 1) % this.sequence.length;
    return {
      newRng: new SequenceRandom(this.sequence, nextIndex),
      value: Math.abs(Math.trunc(raw)) % maxExclusive,
    };
  }
}
