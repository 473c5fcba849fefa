import type { RandomGenerator } from "./interface";

// Pick one element uniformly
export function pickOne<T>(
  rng: RandomGenerator,
  items: ReadonlyArray<T>,
): { item: T; newRng: RandomGenerator } {
  const { newRng, value } = rng.nextInt(items.length);
  const item = items[value];
  if (item === undefined) throw new Error("Cannot pick from an empty list");
  return { item, newRng };
}

/**
 * Draw `count` distinct elements (partial Fisher-Yates over a copy).
 * Order of the result is the draw order.
 */
export function sampleDistinct<T>(
  rng: RandomGenerator,
  items: ReadonlyArray<T>,
  count: number,
): { picked: Array<T>; newRng: RandomGenerator } {
  if (count > items.length) {
    throw new Error(
      `Cannot draw ${String(count)} distinct items from ${String(items.length)}`,
    );
  }
  const pool = [...items];
  const picked: Array<T> = [];
  let current = rng;

  for (let i = 0; i < count; i++) {
    const r = current.nextInt(pool.length - i);
    current = r.newRng;
    const j = i + r.value;
    const a = pool[i] as T;
    const b = pool[j] as T;
    // Both are defined: i and j index into the unshuffled tail of pool
    pool[i] = b;
    pool[j] = a;
    picked.push(b);
  }

  return { newRng: current, picked };
}
