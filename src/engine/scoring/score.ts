/**
 * Scoring is a policy supplied by the host. The engine reports raw counts
 * (PlacementSummary); a ScorePolicy turns them into points.
 */

export type PlacementSummary = Readonly<{
  cellsPlaced: number;
  linesCleared: number;
}>;

export type ScoreBreakdown = Readonly<{
  placementPoints: number;
  lineClearBonus: number;
  total: number;
}>;

export type ScorePolicy = (summary: PlacementSummary) => ScoreBreakdown;

// Base 100 per line plus a doubling combo bonus for simultaneous lines
export function lineClearBonus(linesCleared: number): number {
  if (linesCleared <= 0) return 0;
  const base = 100 * linesCleared;
  const comboMultiplier = 2 ** (linesCleared - 1) - 1;
  return base + comboMultiplier * 100;
}

export const defaultScorePolicy: ScorePolicy = ({
  cellsPlaced,
  linesCleared,
}) => {
  const placementPoints = Math.max(0, cellsPlaced);
  const bonus = lineClearBonus(linesCleared);
  return {
    lineClearBonus: bonus,
    placementPoints,
    total: placementPoints + bonus,
  };
};

export type ScoreTracker = Readonly<{
  total: number;
  best: number;
}>;

export function createScoreTracker(best = 0): ScoreTracker {
  return { best: Math.max(0, best), total: 0 };
}

export function recordPlacement(
  tracker: ScoreTracker,
  breakdown: ScoreBreakdown,
): ScoreTracker {
  const total = tracker.total + breakdown.total;
  return { best: Math.max(tracker.best, total), total };
}

// New game: total back to zero, best kept
export function resetScore(tracker: ScoreTracker): ScoreTracker {
  return { ...tracker, total: 0 };
}

export function restoreScore(total: number, best: number): ScoreTracker {
  const t = Math.max(0, total);
  return { best: Math.max(t, best), total: t };
}
