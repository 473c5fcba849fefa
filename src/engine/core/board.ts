import { debugLog } from "../../utils/debug";
import { InvalidPlacementError } from "../errors";

import { fitsWithin, placedCells } from "./block";
import {
  type BlockColor,
  type BlockInstance,
  type Board,
  type GridCoordinate,
  DEFAULT_BOARD_SIZE,
  cellValueToColor,
  colorToCellValue,
  copyBoardCells,
  createBoardCells,
  createGridCoordinate,
  idx,
  isBlockColor,
} from "./types";

export type ClearedCell = Readonly<{
  at: GridCoordinate;
  color: BlockColor;
}>;

export type PlacementResult = Readonly<{
  board: Board;
  placedCells: ReadonlyArray<GridCoordinate>;
  cellsPlaced: number;
  clearedRows: ReadonlyArray<number>;
  clearedColumns: ReadonlyArray<number>;
  linesCleared: number;
  // unique cells; a row/column intersection counts once
  clearedCells: ReadonlyArray<ClearedCell>;
  cellsCleared: number;
}>;

export function createEmptyBoard(size: number = DEFAULT_BOARD_SIZE): Board {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error("Board size must be a positive integer");
  }
  return { cells: createBoardCells(size), size };
}

export function getCellColor(
  board: Board,
  at: GridCoordinate,
): BlockColor | null {
  return cellValueToColor(board.cells[idx(board, at.row, at.column)] ?? 0);
}

// Check if a block can be placed at a given anchor. Never mutates.
export function canPlace(
  board: Board,
  block: BlockInstance,
  at: GridCoordinate,
): boolean {
  if (!fitsWithin(block, at, board.size)) return false;
  for (const [dr, dc] of block.offsets) {
    if (board.cells[idx(board, at.row + dr, at.column + dc)] !== 0) {
      return false;
    }
  }
  return true;
}

function isRowFull(board: Board, row: number): boolean {
  for (let c = 0; c < board.size; c++) {
    if (board.cells[idx(board, row, c)] === 0) return false;
  }
  return true;
}

function isColumnFull(board: Board, column: number): boolean {
  for (let r = 0; r < board.size; r++) {
    if (board.cells[idx(board, r, column)] === 0) return false;
  }
  return true;
}

export function getCompletedRows(board: Board): ReadonlyArray<number> {
  const rows: Array<number> = [];
  for (let r = 0; r < board.size; r++) {
    if (isRowFull(board, r)) rows.push(r);
  }
  return rows;
}

export function getCompletedColumns(board: Board): ReadonlyArray<number> {
  const columns: Array<number> = [];
  for (let c = 0; c < board.size; c++) {
    if (isColumnFull(board, c)) columns.push(c);
  }
  return columns;
}

/**
 * Place a block and clear every row and column it completes, as one step.
 * Throws InvalidPlacementError (and returns nothing) when canPlace is false.
 * The input board is left untouched; the result carries the new board.
 */
export function commitPlacement(
  board: Board,
  block: BlockInstance,
  at: GridCoordinate,
): PlacementResult {
  if (!canPlace(board, block, at)) {
    throw new InvalidPlacementError(block.archetype, at.row, at.column);
  }

  const cells = copyBoardCells(board.cells);
  const placed = placedCells(block, at, board.size);
  const value = colorToCellValue(block.color);
  for (const cell of placed) {
    cells[idx(board, cell.row, cell.column)] = value;
  }
  const filled: Board = { cells, size: board.size };

  const clearedRows = getCompletedRows(filled);
  const clearedColumns = getCompletedColumns(filled);

  // Collect before zeroing so intersections are seen once with their color
  const clearedIdx = new Set<number>();
  for (const r of clearedRows) {
    for (let c = 0; c < board.size; c++) clearedIdx.add(idx(board, r, c));
  }
  for (const c of clearedColumns) {
    for (let r = 0; r < board.size; r++) clearedIdx.add(idx(board, r, c));
  }

  const clearedCells: Array<ClearedCell> = [];
  for (const i of [...clearedIdx].sort((a, b) => a - b)) {
    const color = cellValueToColor(cells[i] ?? 0);
    if (color !== null) {
      clearedCells.push({
        at: createGridCoordinate(
          Math.floor(i / board.size),
          i % board.size,
          board.size,
        ),
        color,
      });
    }
    cells[i] = 0;
  }

  if (clearedRows.length + clearedColumns.length > 0) {
    debugLog("board", "lines cleared", {
      columns: clearedColumns,
      rows: clearedRows,
    });
  }

  return {
    board: filled,
    cellsCleared: clearedCells.length,
    cellsPlaced: placed.length,
    clearedCells,
    clearedColumns,
    clearedRows,
    linesCleared: clearedRows.length + clearedColumns.length,
    placedCells: placed,
  };
}

// Every anchor where the block fits, row-major
export function findValidAnchors(
  board: Board,
  block: BlockInstance,
): ReadonlyArray<GridCoordinate> {
  const anchors: Array<GridCoordinate> = [];
  for (let r = 0; r + block.height <= board.size; r++) {
    for (let c = 0; c + block.width <= board.size; c++) {
      const at = createGridCoordinate(r, c, board.size);
      if (canPlace(board, block, at)) anchors.push(at);
    }
  }
  return anchors;
}

export function hasAnyValidPlacement(
  board: Board,
  block: BlockInstance,
): boolean {
  for (let r = 0; r + block.height <= board.size; r++) {
    for (let c = 0; c + block.width <= board.size; c++) {
      if (canPlace(board, block, createGridCoordinate(r, c, board.size))) {
        return true;
      }
    }
  }
  return false;
}

export function countFilledCells(board: Board): number {
  return board.cells.reduce((n, v) => (v === 0 ? n : n + 1), 0);
}

export function isBoardFull(board: Board): boolean {
  return countFilledCells(board) === board.size * board.size;
}

// Row-major color grid for renderers and persistence
export function boardToRows(
  board: Board,
): ReadonlyArray<ReadonlyArray<BlockColor | null>> {
  return Array.from({ length: board.size }, (_, r) =>
    Array.from({ length: board.size }, (_, c) =>
      cellValueToColor(board.cells[idx(board, r, c)] ?? 0),
    ),
  );
}

// Inverse of boardToRows; rejects non-square grids and unknown colors
export function boardFromRows(
  rows: ReadonlyArray<ReadonlyArray<unknown>>,
): Board {
  const size = rows.length;
  const board = createEmptyBoard(size);
  const cells = copyBoardCells(board.cells);
  rows.forEach((row, r) => {
    if (row.length !== size) {
      throw new Error(
        `Row ${String(r)} has ${String(row.length)} cells, expected ${String(size)}`,
      );
    }
    row.forEach((value, c) => {
      if (value === null) return;
      if (!isBlockColor(value)) {
        throw new Error(`Unknown cell color at (${String(r)}, ${String(c)})`);
      }
      cells[idx(board, r, c)] = colorToCellValue(value);
    });
  });
  return { cells, size };
}
