import type { CellOffset, OccupancyMatrix } from "./types";

// Pure matrix helpers used to derive shape variations. Inputs are never
// mutated; every function returns fresh arrays.

export function matrixWidth(m: OccupancyMatrix): number {
  return m.reduce((w, row) => Math.max(w, row.length), 0);
}

export function matrixHeight(m: OccupancyMatrix): number {
  return m.length;
}

function cellAt(m: OccupancyMatrix, row: number, column: number): boolean {
  return m[row]?.[column] ?? false;
}

// Pads ragged rows with `false` so every row has the same width
export function normalizeMatrix(m: OccupancyMatrix): Array<Array<boolean>> {
  const width = matrixWidth(m);
  return m.map((row) =>
    Array.from({ length: width }, (_, c) => row[c] ?? false),
  );
}

// 90° clockwise: new[r][c] = old[h-1-c][r]
export function rotateClockwise(m: OccupancyMatrix): Array<Array<boolean>> {
  const h = matrixHeight(m);
  const w = matrixWidth(m);
  return Array.from({ length: w }, (_, r) =>
    Array.from({ length: h }, (_, c) => cellAt(m, h - 1 - c, r)),
  );
}

// Left-right reflection
export function mirrorHorizontal(m: OccupancyMatrix): Array<Array<boolean>> {
  return normalizeMatrix(m).map((row) => [...row].reverse());
}

// Shrinks to the minimal bounding box around filled cells
export function cropToBounds(m: OccupancyMatrix): Array<Array<boolean>> {
  const h = matrixHeight(m);
  const w = matrixWidth(m);
  let top = h;
  let bottom = -1;
  let left = w;
  let right = -1;

  for (let r = 0; r < h; r++) {
    for (let c = 0; c < w; c++) {
      if (!cellAt(m, r, c)) continue;
      top = Math.min(top, r);
      bottom = Math.max(bottom, r);
      left = Math.min(left, c);
      right = Math.max(right, c);
    }
  }

  if (bottom < 0) return [];

  return Array.from({ length: bottom - top + 1 }, (_, r) =>
    Array.from({ length: right - left + 1 }, (_, c) =>
      cellAt(m, top + r, left + c),
    ),
  );
}

export function matrixEquals(a: OccupancyMatrix, b: OccupancyMatrix): boolean {
  if (matrixHeight(a) !== matrixHeight(b)) return false;
  if (matrixWidth(a) !== matrixWidth(b)) return false;
  for (let r = 0; r < a.length; r++) {
    for (let c = 0; c < matrixWidth(a); c++) {
      if (cellAt(a, r, c) !== cellAt(b, r, c)) return false;
    }
  }
  return true;
}

// Stable string key, e.g. "10|11" for a corner
export function matrixKey(m: OccupancyMatrix): string {
  return normalizeMatrix(m)
    .map((row) => row.map((filled) => (filled ? "1" : "0")).join(""))
    .join("|");
}

export function occupiedOffsets(m: OccupancyMatrix): Array<CellOffset> {
  const offsets: Array<CellOffset> = [];
  m.forEach((row, r) => {
    row.forEach((filled, c) => {
      if (filled) offsets.push([r, c]);
    });
  });
  return offsets;
}

export function countFilled(m: OccupancyMatrix): number {
  return occupiedOffsets(m).length;
}

export function isRectangular(m: OccupancyMatrix): boolean {
  const w = matrixWidth(m);
  return m.length > 0 && m.every((row) => row.length === w);
}

// Parses the compact "X." notation used by the catalog
export function parsePattern(rows: ReadonlyArray<string>): OccupancyMatrix {
  return rows.map((line) => [...line].map((ch) => ch === "X"));
}
