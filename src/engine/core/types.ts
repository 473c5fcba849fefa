import { OutOfBoundsError } from "../errors";

// Board and tray defaults (overridable through settings)
export const DEFAULT_BOARD_SIZE = 10 as const;
export const DEFAULT_TRAY_SLOTS = 3 as const;

// Grid coordinates - a validated (row, column) pair on an N×N board.
// Only createGridCoordinate can produce one.
declare const GridCoordinateBrand: unique symbol;
export type GridCoordinate = Readonly<{ row: number; column: number }> & {
  readonly [GridCoordinateBrand]: true;
};

export function isInBounds(
  row: number,
  column: number,
  boardSize: number,
): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(column) &&
    row >= 0 &&
    row < boardSize &&
    column >= 0 &&
    column < boardSize
  );
}

export function createGridCoordinate(
  row: number,
  column: number,
  boardSize: number,
): GridCoordinate {
  if (!isInBounds(row, column, boardSize)) {
    throw new OutOfBoundsError(row, column, boardSize);
  }
  return { column, row } as GridCoordinate;
}

// Non-throwing variant for scans and pointer mapping
export function tryGridCoordinate(
  row: number,
  column: number,
  boardSize: number,
): GridCoordinate | null {
  return isInBounds(row, column, boardSize)
    ? createGridCoordinate(row, column, boardSize)
    : null;
}

// Shape check only; bounds depend on the board the coordinate is used with
export function isGridCoordinate(n: unknown): n is GridCoordinate {
  return (
    typeof n === "object" &&
    n !== null &&
    "row" in n &&
    "column" in n &&
    typeof n.row === "number" &&
    typeof n.column === "number" &&
    Number.isInteger(n.row) &&
    Number.isInteger(n.column) &&
    n.row >= 0 &&
    n.column >= 0
  );
}

export function assertGridCoordinate(
  n: unknown,
): asserts n is GridCoordinate {
  if (!isGridCoordinate(n)) throw new Error("Not a valid GridCoordinate");
}

export function gridCoordinateEquals(
  a: GridCoordinate,
  b: GridCoordinate,
): boolean {
  return a.row === b.row && a.column === b.column;
}

// Block colors - stored on the board as cell values 1..8 (0 = empty)
export const BLOCK_COLORS = [
  "red",
  "blue",
  "green",
  "yellow",
  "purple",
  "orange",
  "cyan",
  "pink",
] as const;
export type BlockColor = (typeof BLOCK_COLORS)[number];

export function isBlockColor(s: unknown): s is BlockColor {
  return (
    typeof s === "string" &&
    (BLOCK_COLORS as ReadonlyArray<string>).includes(s)
  );
}

declare const CellValueBrand: unique symbol;
export type CellValue = (0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8) & {
  readonly [CellValueBrand]: true;
};

export function createCellValue(value: number): CellValue {
  if (!Number.isInteger(value) || value < 0 || value > BLOCK_COLORS.length) {
    throw new Error("CellValue must be an integer from 0 to 8");
  }
  return value as CellValue;
}

export function isCellValue(n: unknown): n is CellValue {
  return (
    typeof n === "number" &&
    Number.isInteger(n) &&
    n >= 0 &&
    n <= BLOCK_COLORS.length
  );
}

export function assertCellValue(n: unknown): asserts n is CellValue {
  if (!isCellValue(n)) throw new Error("Not a valid CellValue");
}

export function assertBlockColor(s: unknown): asserts s is BlockColor {
  if (!isBlockColor(s)) throw new Error("Not a valid BlockColor");
}

export function colorToCellValue(color: BlockColor): CellValue {
  return createCellValue(BLOCK_COLORS.indexOf(color) + 1);
}

export function cellValueToColor(value: number): BlockColor | null {
  if (value === 0) return null;
  return BLOCK_COLORS[value - 1] ?? null;
}

// Shapes
export type ArchetypeId =
  | "single"
  | "domino"
  | "line3"
  | "corner3"
  | "line4"
  | "square2"
  | "tee4"
  | "ell4"
  | "skew4"
  | "line5"
  | "corner5"
  | "plus5"
  | "pee5"
  | "rect2x3";

// Row-major, top-left origin
export type OccupancyMatrix = ReadonlyArray<ReadonlyArray<boolean>>;

// (row, column) relative to a pattern's own top-left bounding box
export type CellOffset = readonly [row: number, column: number];

export type ShapeArchetype = Readonly<{
  id: ArchetypeId;
  label: string;
  canonical: OccupancyMatrix;
  cellCount: number;
  // 0..1, compared against a difficulty's complexity weight
  complexity: number;
}>;

export type ShapeVariation = Readonly<{
  archetype: ArchetypeId;
  index: number;
  matrix: OccupancyMatrix;
  width: number;
  height: number;
  offsets: ReadonlyArray<CellOffset>;
}>;

export type BlockInstance = Readonly<{
  archetype: ArchetypeId;
  variationIndex: number;
  color: BlockColor;
  width: number;
  height: number;
  offsets: ReadonlyArray<CellOffset>;
}>;

// Board cells: size*size values, row-major
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly [BoardCellsBrand]: true };

export function createBoardCells(size: number): BoardCells {
  return new Uint8Array(size * size) as BoardCells;
}

export function copyBoardCells(cells: BoardCells): BoardCells {
  return Uint8Array.from(cells) as BoardCells;
}

export type Board = Readonly<{
  size: number;
  cells: BoardCells; // values 0..8 (0=empty, 1-8=block colors)
}>;

export function idx(board: Board, row: number, column: number): number {
  return row * board.size + column;
}
