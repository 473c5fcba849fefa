// Tests for @/engine/core/board.ts
import {
  boardFromRows,
  boardToRows,
  canPlace,
  commitPlacement,
  countFilledCells,
  createEmptyBoard,
  findValidAnchors,
  getCellColor,
  getCompletedColumns,
  getCompletedRows,
  hasAnyValidPlacement,
  isBoardFull,
} from "@/engine/core/board";
import { InvalidPlacementError } from "@/engine/errors";

import {
  at,
  block,
  boardFromPicture,
  fullBoardExcept,
  pictureOf,
} from "../../test-helpers";

describe("@/engine/core/board — creation", () => {
  test("createEmptyBoard defaults to 10x10 and all empty", () => {
    const board = createEmptyBoard();
    expect(board.size).toBe(10);
    expect(board.cells).toHaveLength(100);
    expect(countFilledCells(board)).toBe(0);
  });

  test("createEmptyBoard rejects a non-positive size", () => {
    expect(() => createEmptyBoard(0)).toThrow(
      "Board size must be a positive integer",
    );
  });
});

describe("@/engine/core/board — canPlace", () => {
  test("accepts an in-bounds placement on empty cells", () => {
    expect(canPlace(createEmptyBoard(), block("square2"), at(8, 8))).toBe(true);
  });

  test("rejects a placement that overhangs the edge", () => {
    expect(canPlace(createEmptyBoard(), block("square2"), at(9, 8))).toBe(
      false,
    );
  });

  test("rejects a placement over an occupied cell", () => {
    const board = boardFromPicture(["...", ".1.", "..."]);
    expect(canPlace(board, block("domino"), at(1, 0, 3))).toBe(false);
    expect(canPlace(board, block("domino"), at(0, 0, 3))).toBe(true);
  });

  test("empty cells inside the bounding box do not block", () => {
    // corner3 variation 0 leaves its top-right cell empty
    const board = boardFromPicture([".1.", "...", "..."]);
    expect(canPlace(board, block("corner3"), at(0, 0, 3))).toBe(true);
  });

  test("never changes the board", () => {
    const board = boardFromPicture(["1..", "...", "..."]);
    const before = pictureOf(board);
    canPlace(board, block("line3"), at(1, 0, 3));
    canPlace(board, block("line3"), at(0, 0, 3));
    expect(pictureOf(board)).toEqual(before);
  });
});

describe("@/engine/core/board — commitPlacement", () => {
  test("paints the block's cells in its color", () => {
    const result = commitPlacement(
      createEmptyBoard(4),
      block("corner3", 0, "blue"),
      at(1, 1, 4),
    );
    expect(pictureOf(result.board)).toEqual(["....", ".2..", ".22.", "...."]);
    expect(result.cellsPlaced).toBe(3);
    expect(result.linesCleared).toBe(0);
    expect(result.clearedCells).toEqual([]);
    expect(getCellColor(result.board, at(2, 2, 4))).toBe("blue");
  });

  test("leaves the input board untouched", () => {
    const board = createEmptyBoard(4);
    commitPlacement(board, block("line4"), at(0, 0, 4));
    expect(countFilledCells(board)).toBe(0);
  });

  test("placing on the same anchor twice fails the second time", () => {
    const empty = createEmptyBoard();
    const first = commitPlacement(empty, block("domino"), at(3, 3));
    expect(() =>
      commitPlacement(first.board, block("domino"), at(3, 3)),
    ).toThrow(InvalidPlacementError);
    expect(() =>
      commitPlacement(first.board, block("domino"), at(3, 3)),
    ).toThrow("Cannot place domino at (3, 3)");
  });

  test("a failed placement changes nothing", () => {
    const board = boardFromPicture(["..1", "...", "..."]);
    expect(() => commitPlacement(board, block("line3"), at(0, 0, 3))).toThrow(
      InvalidPlacementError,
    );
    expect(pictureOf(board)).toEqual(["..1", "...", "..."]);
  });

  test("filling row 0 one block at a time clears only row 0", () => {
    let board = createEmptyBoard();
    for (const column of [0, 2, 4, 6]) {
      board = commitPlacement(board, block("domino"), at(0, column)).board;
    }
    board = commitPlacement(board, block("single"), at(0, 8)).board;
    board = commitPlacement(board, block("single", 0, "green"), at(5, 5)).board;
    expect(getCompletedRows(board)).toEqual([]);

    const result = commitPlacement(board, block("single"), at(0, 9));
    expect(result.clearedRows).toEqual([0]);
    expect(result.clearedColumns).toEqual([]);
    expect(result.linesCleared).toBe(1);
    expect(result.cellsCleared).toBe(10);
    expect(countFilledCells(result.board)).toBe(1);
    expect(getCellColor(result.board, at(5, 5))).toBe("green");
  });

  test("a row and column cleared together count the shared cell once", () => {
    const board = boardFromPicture([
      ".111",
      "1...",
      "1...",
      "1...",
    ]);
    const single = block("single", 0, "yellow");
    const result = commitPlacement(board, single, at(0, 0, 4));
    expect(result.clearedRows).toEqual([0]);
    expect(result.clearedColumns).toEqual([0]);
    expect(result.linesCleared).toBe(2);
    expect(result.cellsCleared).toBe(7);
    expect(countFilledCells(result.board)).toBe(0);
    expect(result.clearedCells[0]).toEqual({
      at: { column: 0, row: 0 },
      color: "yellow",
    });
  });

  test("cleared cells are reported row-major with their colors", () => {
    const board = boardFromPicture(["12.", "...", "..."]);
    const single = block("single", 0, "cyan");
    const result = commitPlacement(board, single, at(0, 2, 3));
    expect(
      result.clearedCells.map((c) => [c.at.row, c.at.column, c.color]),
    ).toEqual([
      [0, 0, "red"],
      [0, 1, "blue"],
      [0, 2, "cyan"],
    ]);
  });

  test("several rows clear in one placement", () => {
    const board = boardFromPicture(["111.", "111.", "....", "...."]);
    const result = commitPlacement(board, block("domino", 1), at(0, 3, 4));
    expect(result.clearedRows).toEqual([0, 1]);
    expect(result.linesCleared).toBe(2);
    expect(pictureOf(result.board)).toEqual(["....", "....", "....", "...."]);
  });
});

describe("@/engine/core/board — queries", () => {
  test("getCompletedRows and getCompletedColumns", () => {
    const board = boardFromPicture(["111", "1..", "1.."]);
    expect(getCompletedRows(board)).toEqual([0]);
    expect(getCompletedColumns(board)).toEqual([0]);
  });

  test("findValidAnchors lists every fitting anchor row-major", () => {
    const board = boardFromPicture(["1..", "...", "..1"]);
    const anchors = findValidAnchors(board, block("square2"));
    expect(anchors.map((a) => [a.row, a.column])).toEqual([
      [0, 1],
      [1, 0],
    ]);
  });

  test("hasAnyValidPlacement is false when no anchor fits", () => {
    const board = fullBoardExcept(10, [
      [0, 0],
      [5, 5],
    ]);
    expect(hasAnyValidPlacement(board, block("single"))).toBe(true);
    expect(hasAnyValidPlacement(board, block("domino"))).toBe(false);
  });

  test("isBoardFull", () => {
    expect(isBoardFull(fullBoardExcept(3, []))).toBe(true);
    expect(isBoardFull(fullBoardExcept(3, [[1, 1]]))).toBe(false);
  });
});

describe("@/engine/core/board — rows", () => {
  test("boardToRows and boardFromRows convert both ways", () => {
    const board = boardFromPicture(["1.", ".8"]);
    const rows = boardToRows(board);
    expect(rows).toEqual([
      ["red", null],
      [null, "pink"],
    ]);
    expect(pictureOf(boardFromRows(rows))).toEqual(["1.", ".8"]);
  });

  test("boardFromRows rejects a ragged grid", () => {
    expect(() => boardFromRows([[null, null], [null]])).toThrow(
      "Row 1 has 1 cells, expected 2",
    );
  });

  test("boardFromRows rejects an unknown color", () => {
    expect(() => boardFromRows([["mauve"]])).toThrow(
      "Unknown cell color at (0, 0)",
    );
  });
});
