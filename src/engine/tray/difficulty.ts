import { ARCHETYPE_IDS, ARCHETYPES } from "../core/shapes";

import type { ArchetypeId } from "../core/types";

export const DIFFICULTIES = ["easy", "medium", "hard", "expert"] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export type DifficultyProfile = Readonly<{
  minCells: number;
  maxCells: number;
  // archetypes above this complexity are not offered
  complexityWeight: number;
}>;

export const DIFFICULTY_PROFILES: Readonly<
  Record<Difficulty, DifficultyProfile>
> = {
  easy: { complexityWeight: 0.3, maxCells: 3, minCells: 1 },
  expert: { complexityWeight: 1.0, maxCells: 6, minCells: 2 },
  hard: { complexityWeight: 0.7, maxCells: 5, minCells: 2 },
  medium: { complexityWeight: 0.5, maxCells: 4, minCells: 1 },
};

export function isDifficulty(s: unknown): s is Difficulty {
  return (
    typeof s === "string" && (DIFFICULTIES as ReadonlyArray<string>).includes(s)
  );
}

// Archetypes a profile admits, in catalog order
export function eligibleArchetypes(
  profile: DifficultyProfile,
): ReadonlyArray<ArchetypeId> {
  return ARCHETYPE_IDS.filter((id) => {
    const a = ARCHETYPES[id];
    return (
      a.cellCount >= profile.minCells &&
      a.cellCount <= profile.maxCells &&
      a.complexity <= profile.complexityWeight
    );
  });
}
