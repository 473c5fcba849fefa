import { getVariation } from "./shapes";
import { isInBounds, tryGridCoordinate } from "./types";

import type {
  ArchetypeId,
  BlockColor,
  BlockInstance,
  GridCoordinate,
  ShapeVariation,
} from "./types";

export function createBlockInstance(
  variation: ShapeVariation,
  color: BlockColor,
): BlockInstance {
  return {
    archetype: variation.archetype,
    color,
    height: variation.height,
    offsets: variation.offsets,
    variationIndex: variation.index,
    width: variation.width,
  };
}

export function blockFromCatalog(
  archetype: ArchetypeId,
  variationIndex: number,
  color: BlockColor,
): BlockInstance {
  return createBlockInstance(getVariation(archetype, variationIndex), color);
}

// Bounds-only fit: every occupied offset lands on the board (occupancy ignored)
export function fitsWithin(
  block: BlockInstance,
  at: GridCoordinate,
  boardSize: number,
): boolean {
  return block.offsets.every(([dr, dc]) =>
    isInBounds(at.row + dr, at.column + dc, boardSize),
  );
}

// A block can appear on a board of this size at all
export function fitsBoard(block: BlockInstance, boardSize: number): boolean {
  return block.width <= boardSize && block.height <= boardSize;
}

/**
 * Board cells the block would cover when anchored at `at`. Offsets that
 * fall off the board are skipped, so check fitsWithin first.
 */
export function placedCells(
  block: BlockInstance,
  at: GridCoordinate,
  boardSize: number,
): Array<GridCoordinate> {
  const cells: Array<GridCoordinate> = [];
  for (const [dr, dc] of block.offsets) {
    const cell = tryGridCoordinate(at.row + dr, at.column + dc, boardSize);
    if (cell !== null) cells.push(cell);
  }
  return cells;
}

export function cellCount(block: BlockInstance): number {
  return block.offsets.length;
}
