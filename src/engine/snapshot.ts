import { blockFromCatalog } from "./core/block";
import { boardFromRows, boardToRows } from "./core/board";
import { decodeArchetype, findVariationIndex } from "./core/shapes";
import { isBlockColor } from "./core/types";
import { InvalidSnapshotError, UnknownArchetypeError } from "./errors";
import { type ScoreTracker, restoreScore } from "./scoring/score";

import type {
  ArchetypeId,
  BlockColor,
  BlockInstance,
  Board,
} from "./core/types";
import type { TraySlot } from "./tray/dispenser";

// Plain, JSON-safe view of a session for the persistence collaborator.
// How and where it is stored is up to the host.

export const SNAPSHOT_VERSION = 1 as const;

export type BlockSnapshot = {
  archetype: string;
  color: BlockColor;
  cells: Array<Array<boolean>>;
};

export type GameSnapshot = {
  version: typeof SNAPSHOT_VERSION;
  score: number;
  bestScore: number;
  grid: Array<Array<BlockColor | null>>;
  tray: Array<BlockSnapshot | null>;
};

export type RestoredState = Readonly<{
  board: Board;
  slots: ReadonlyArray<TraySlot>;
  score: ScoreTracker;
}>;

function blockToSnapshot(block: BlockInstance): BlockSnapshot {
  const height = block.height;
  const width = block.width;
  const cells = Array.from({ length: height }, () =>
    Array.from({ length: width }, () => false),
  );
  for (const [r, c] of block.offsets) {
    const row = cells[r];
    if (row !== undefined) row[c] = true;
  }
  return { archetype: block.archetype, cells, color: block.color };
}

export function createSnapshot(
  board: Board,
  slots: ReadonlyArray<TraySlot>,
  score: ScoreTracker,
): GameSnapshot {
  return {
    bestScore: score.best,
    grid: boardToRows(board).map((row) => [...row]),
    score: score.total,
    tray: slots.map((s) => (s === null ? null : blockToSnapshot(s))),
    version: SNAPSHOT_VERSION,
  };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isBoolMatrix(x: unknown): x is Array<Array<boolean>> {
  return (
    Array.isArray(x) &&
    x.every(
      (row) =>
        Array.isArray(row) && row.every((v) => typeof v === "boolean"),
    )
  );
}

function isNonNegative(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x) && x >= 0;
}

function decodeSlotArchetype(identifier: string, slot: number): ArchetypeId {
  try {
    return decodeArchetype(identifier);
  } catch (error) {
    if (error instanceof UnknownArchetypeError) {
      throw new InvalidSnapshotError(
        `tray slot ${String(slot)}: ${error.message}`,
      );
    }
    throw error;
  }
}

function blockFromSnapshot(raw: unknown, slot: number): BlockInstance {
  if (!isRecord(raw)) {
    throw new InvalidSnapshotError(`tray slot ${String(slot)} is malformed`);
  }
  const { archetype, cells, color } = raw;
  if (typeof archetype !== "string") {
    throw new InvalidSnapshotError(
      `tray slot ${String(slot)} has no archetype`,
    );
  }
  if (!isBlockColor(color)) {
    throw new InvalidSnapshotError(`tray slot ${String(slot)} has no color`);
  }

  const id = decodeSlotArchetype(archetype, slot);

  // Saves from the first release carry no cells; unknown orientations
  // fall back to the canonical one
  const found = isBoolMatrix(cells) ? findVariationIndex(id, cells) : -1;
  return blockFromCatalog(id, Math.max(0, found), color);
}

/**
 * Validate an untrusted snapshot and rebuild board, tray and score.
 * Tray identifiers go through legacy decoding.
 */
export function restoreSnapshot(raw: unknown): RestoredState {
  if (!isRecord(raw)) throw new InvalidSnapshotError("not an object");
  const { bestScore, grid, score, tray, version } = raw;

  if (version !== SNAPSHOT_VERSION) {
    throw new InvalidSnapshotError(`unsupported version ${String(version)}`);
  }
  if (!isNonNegative(score) || !isNonNegative(bestScore)) {
    throw new InvalidSnapshotError("score fields must be non-negative numbers");
  }
  if (!Array.isArray(grid) || grid.length === 0 || !grid.every(Array.isArray)) {
    throw new InvalidSnapshotError("grid must be a non-empty list of rows");
  }
  if (!Array.isArray(tray) || tray.length === 0) {
    throw new InvalidSnapshotError("tray must be a non-empty list");
  }

  let board: Board;
  try {
    board = boardFromRows(grid);
  } catch (error) {
    throw new InvalidSnapshotError(
      error instanceof Error ? error.message : String(error),
    );
  }

  const slots: Array<TraySlot> = tray.map((entry: unknown, i) =>
    entry === null ? null : blockFromSnapshot(entry, i),
  );

  return { board, score: restoreScore(score, bestScore), slots };
}
