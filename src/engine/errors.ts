/**
 * Error family raised by the engine. Every failure a caller can correct
 * (bad coordinate, blocked placement, empty slot) is one of these; drag
 * state-machine misuse is never an error, only a logged no-op.
 */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineError";
  }
}

export class OutOfBoundsError extends EngineError {
  readonly row: number;
  readonly column: number;
  readonly boardSize: number;

  constructor(row: number, column: number, boardSize: number) {
    super(
      `Coordinate (${String(row)}, ${String(column)}) is outside a ${String(boardSize)}x${String(boardSize)} board`,
    );
    this.name = "OutOfBoundsError";
    this.row = row;
    this.column = column;
    this.boardSize = boardSize;
  }
}

export class InvalidPlacementError extends EngineError {
  readonly archetype: string;
  readonly row: number;
  readonly column: number;

  constructor(archetype: string, row: number, column: number) {
    super(
      `Cannot place ${archetype} at (${String(row)}, ${String(column)})`,
    );
    this.name = "InvalidPlacementError";
    this.archetype = archetype;
    this.row = row;
    this.column = column;
  }
}

export type InvalidSlotReason = "out-of-range" | "empty";

export class InvalidSlotError extends EngineError {
  readonly slotIndex: number;
  readonly reason: InvalidSlotReason;

  constructor(slotIndex: number, reason: InvalidSlotReason) {
    super(
      reason === "empty"
        ? `Tray slot ${String(slotIndex)} is already empty`
        : `Tray slot ${String(slotIndex)} does not exist`,
    );
    this.name = "InvalidSlotError";
    this.slotIndex = slotIndex;
    this.reason = reason;
  }
}

export class UnknownArchetypeError extends EngineError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Unknown shape identifier "${identifier}"`);
    this.name = "UnknownArchetypeError";
    this.identifier = identifier;
  }
}

export class InvalidSnapshotError extends EngineError {
  constructor(detail: string) {
    super(`Invalid snapshot: ${detail}`);
    this.name = "InvalidSnapshotError";
  }
}
