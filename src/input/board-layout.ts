import { tryGridCoordinate } from "../engine/core/types";

import type { GridCoordinate } from "../engine/core/types";
import type { Point } from "./types";

// Where the board sits on screen, supplied by the view layer
export type BoardLayout = Readonly<{
  origin: Point; // top-left of cell (0, 0)
  cellSize: number;
}>;

function assertCellSize(layout: BoardLayout): void {
  if (!(layout.cellSize > 0) || !Number.isFinite(layout.cellSize)) {
    throw new Error("BoardLayout cellSize must be a positive finite number");
  }
}

// Half up; unlike Math.round never yields -0
function nearest(v: number): number {
  return Math.floor(v + 0.5);
}

// Cell under a single point (e.g. the finger); null off the board
export function cellAtPoint(
  layout: BoardLayout,
  point: Point,
  boardSize: number,
): GridCoordinate | null {
  assertCellSize(layout);
  const column = Math.floor((point.x - layout.origin.x) / layout.cellSize);
  const row = Math.floor((point.y - layout.origin.y) / layout.cellSize);
  return tryGridCoordinate(row, column, boardSize);
}

/**
 * Anchor cell for a block whose top-left is drawn at `blockOrigin`: the
 * nearest cell corner, so a block half a cell off still snaps where it
 * visually sits. Null when that corner is off the board.
 */
export function anchorForOrigin(
  layout: BoardLayout,
  blockOrigin: Point,
  boardSize: number,
): GridCoordinate | null {
  assertCellSize(layout);
  const column = nearest((blockOrigin.x - layout.origin.x) / layout.cellSize);
  const row = nearest((blockOrigin.y - layout.origin.y) / layout.cellSize);
  return tryGridCoordinate(row, column, boardSize);
}

// Top-left screen point of a cell
export function cellToPoint(layout: BoardLayout, at: GridCoordinate): Point {
  assertCellSize(layout);
  return {
    x: layout.origin.x + at.column * layout.cellSize,
    y: layout.origin.y + at.row * layout.cellSize,
  };
}
