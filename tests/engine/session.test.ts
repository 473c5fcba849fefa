// Tests for @/engine/session.ts
import { countFilledCells, getCellColor } from "@/engine/core/board";
import { SequenceRandom } from "@/engine/core/rng/sequence";
import {
  EngineError,
  InvalidPlacementError,
  InvalidSlotError,
  InvalidSnapshotError,
} from "@/engine/errors";
import { type DomainEvent } from "@/engine/events";
import { GameSession, type GameSessionOptions } from "@/engine/session";
import { createSnapshot } from "@/engine/snapshot";
import { type TraySlot } from "@/engine/tray/dispenser";
import { ManualScheduler } from "@/runtime/scheduler";
import { createSeed } from "@/types/brands";

import {
  assertDefined,
  at,
  block,
  boardFromPicture,
  findEvents,
  pictureOf,
} from "../test-helpers";

// Easy trays drawn with all-zero randomness are [single, domino, line3]
function newSession(options: GameSessionOptions = {}): GameSession {
  return new GameSession({
    rng: new SequenceRandom([0]),
    scheduler: new ManualScheduler(),
    settings: { difficulty: "easy" },
    ...options,
  });
}

function restoredSession(
  picture: ReadonlyArray<string>,
  slots: ReadonlyArray<TraySlot>,
  options: GameSessionOptions = {},
): GameSession {
  const snapshot = createSnapshot(boardFromPicture(picture), slots, {
    best: 0,
    total: 0,
  });
  return GameSession.restore(snapshot, {
    rng: new SequenceRandom([0]),
    scheduler: new ManualScheduler(),
    settings: { difficulty: "easy" },
    ...options,
  });
}

function archetypes(session: GameSession): Array<string | null> {
  return session.getTraySlots().map((s) => (s === null ? null : s.archetype));
}

describe("@/engine/session — setup", () => {
  test("starts with an empty board, a full tray and no score", () => {
    const session = newSession();
    expect(session.getBoard().size).toBe(10);
    expect(countFilledCells(session.getBoard())).toBe(0);
    expect(archetypes(session)).toEqual(["single", "domino", "line3"]);
    expect(session.getScore()).toEqual({ best: 0, total: 0 });
    expect(session.isGameOver()).toBe(false);
  });

  test("settings shape the board and tray", () => {
    const session = newSession({
      bestScore: 250,
      settings: { boardSize: 6, difficulty: "medium", traySlotCount: 4 },
    });
    expect(session.getBoard().size).toBe(6);
    expect(session.getTraySlots()).toHaveLength(4);
    expect(session.getScore()).toEqual({ best: 250, total: 0 });
  });

  test("the same seed deals the same tray", () => {
    const a = new GameSession({ settings: { seed: createSeed("test-seed") } });
    const b = new GameSession({ settings: { seed: createSeed("test-seed") } });
    expect(a.getTraySlots()).toEqual(b.getTraySlots());
  });
});

describe("@/engine/session — placeBlock", () => {
  test("places, scores and consumes the slot", () => {
    const session = newSession();
    const outcome = session.placeBlock(1, at(0, 0));

    expect(outcome.placement.cellsPlaced).toBe(2);
    expect(outcome.score).toEqual({
      lineClearBonus: 0,
      placementPoints: 2,
      total: 2,
    });
    expect(outcome.refilled).toBe(false);
    expect(outcome.gameOver).toBe(false);
    expect(outcome.events.map((e) => e.kind)).toEqual([
      "BlockPlaced",
      "ScoreChanged",
      "SlotConsumed",
    ]);
    expect(getCellColor(session.getBoard(), at(0, 1))).toBe("red");
    expect(session.getScore()).toEqual({ best: 2, total: 2 });
    expect(archetypes(session)).toEqual(["single", null, "line3"]);
  });

  test("a blocked placement throws and changes nothing", () => {
    const session = newSession();
    session.placeBlock(0, at(0, 1));
    const board = session.getBoard();

    expect(() => session.placeBlock(1, at(0, 0))).toThrow(
      InvalidPlacementError,
    );
    expect(session.getBoard()).toBe(board);
    expect(session.getScore().total).toBe(1);
    expect(archetypes(session)).toEqual([null, "domino", "line3"]);
  });

  test("an overhanging placement throws", () => {
    const session = newSession();
    expect(() => session.placeBlock(2, at(0, 8))).toThrow(
      "Cannot place line3 at (0, 8)",
    );
  });

  test("empty and missing slots throw", () => {
    const session = newSession();
    session.placeBlock(1, at(0, 0));
    expect(() => session.placeBlock(1, at(5, 5))).toThrow(InvalidSlotError);
    expect(() => session.placeBlock(1, at(5, 5))).toThrow(
      "Tray slot 1 is already empty",
    );
    expect(() => session.placeBlock(3, at(5, 5))).toThrow(
      "Tray slot 3 does not exist",
    );
  });

  test("canPlace checks slot and board", () => {
    const session = newSession();
    expect(session.canPlace(2, at(0, 7))).toBe(true);
    expect(session.canPlace(2, at(0, 8))).toBe(false);
    expect(session.canPlace(7, at(0, 0))).toBe(false);
  });

  test("completing a row clears it and earns the line bonus", () => {
    const session = restoredSession(
      ["111.", "....", "....", "...."],
      [block("single"), block("domino"), null],
    );
    const outcome = session.placeBlock(0, at(0, 3, 4));

    const [cleared] = findEvents(outcome.events, "LinesCleared");
    assertDefined(cleared);
    expect(cleared.rows).toEqual([0]);
    expect(cleared.columns).toEqual([]);
    expect(cleared.cells).toHaveLength(4);
    expect(outcome.score).toEqual({
      lineClearBonus: 100,
      placementPoints: 1,
      total: 101,
    });
    expect(pictureOf(session.getBoard())).toEqual([
      "....",
      "....",
      "....",
      "....",
    ]);
  });

  test("the tray refills once its last block is placed", () => {
    const session = newSession();
    session.placeBlock(0, at(5, 5));
    session.placeBlock(1, at(7, 0));
    const outcome = session.placeBlock(2, at(9, 0));

    expect(outcome.refilled).toBe(true);
    const [refill] = findEvents(outcome.events, "TrayRefilled");
    assertDefined(refill);
    expect(refill.reason).toBe("exhausted");
    expect(refill.slots.map((s) => s?.archetype)).toEqual([
      "single",
      "domino",
      "line3",
    ]);
    expect(archetypes(session)).toEqual(["single", "domino", "line3"]);
  });

  test("the game ends when no offered block fits", () => {
    const session = restoredSession(
      ["1.1.", ".1.1", "1.1.", ".1.."],
      [block("single"), block("domino"), null],
    );
    expect(session.isGameOver()).toBe(false);

    const outcome = session.placeBlock(0, at(3, 3, 4));
    expect(outcome.gameOver).toBe(true);
    expect(session.isGameOver()).toBe(true);
    expect(outcome.events[outcome.events.length - 1]).toEqual({
      best: 1,
      kind: "GameOver",
      score: 1,
    });
    expect(() => session.placeBlock(1, at(0, 1, 4))).toThrow(EngineError);
    expect(() => session.placeBlock(1, at(0, 1, 4))).toThrow(
      "Game is over; restart to continue",
    );
  });

  test("a custom score policy replaces the default", () => {
    const session = newSession({
      scorePolicy: () => ({ lineClearBonus: 0, placementPoints: 7, total: 7 }),
    });
    session.placeBlock(0, at(0, 0));
    expect(session.getScore().total).toBe(7);
  });

  test("listeners receive every event in order", () => {
    const session = newSession();
    const seen: Array<DomainEvent["kind"]> = [];
    const unsubscribe = session.subscribe((e) => seen.push(e.kind));
    session.placeBlock(0, at(0, 0));
    unsubscribe();
    session.placeBlock(1, at(2, 0));
    expect(seen).toEqual(["BlockPlaced", "ScoreChanged", "SlotConsumed"]);
  });
});

describe("@/engine/session — restart", () => {
  test("clears the board and score but keeps the best", () => {
    const session = newSession();
    session.placeBlock(2, at(0, 0));
    const events = session.restart();

    expect(events).toEqual([
      { boardSize: 10, kind: "GameStarted" },
      {
        kind: "TrayRefilled",
        reason: "restart",
        slots: session.getTraySlots(),
      },
    ]);
    expect(countFilledCells(session.getBoard())).toBe(0);
    expect(session.getScore()).toEqual({ best: 3, total: 0 });
    expect(archetypes(session)).toEqual(["single", "domino", "line3"]);
    expect(session.isGameOver()).toBe(false);
  });

  test("a finished game can be restarted", () => {
    const session = restoredSession(
      ["1.1.", ".1.1", "1.1.", ".1.."],
      [block("single"), block("domino"), null],
    );
    session.placeBlock(0, at(3, 3, 4));
    session.restart();
    expect(session.isGameOver()).toBe(false);
    expect(session.getBoard().size).toBe(4);
  });
});

describe("@/engine/session — dragging onto the board", () => {
  const layout = { cellSize: 40, origin: { x: 0, y: 0 } };
  let warn: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  // Domino from slot 1, grabbed 5px into its tray drawing (tray cells are 20px)
  function grabDomino(session: GameSession): void {
    expect(
      session.beginDrag(1, { x: 205, y: 305 }, { x: 200, y: 300 }, 20),
    ).toBe(true);
  }

  test("moving previews the anchor under the rescaled block origin", () => {
    const session = newSession();
    grabDomino(session);
    expect(session.moveDrag({ x: 90, y: 130 }, layout)).toEqual({
      anchor: { column: 2, row: 3 },
      blockOrigin: { x: 80, y: 120 },
      valid: true,
    });
  });

  test("releasing over free cells places the block", () => {
    const session = newSession();
    grabDomino(session);
    const result = session.releaseDrag({ x: 90, y: 130 }, layout);

    if (result.kind !== "placed") throw new Error(result.kind);
    expect(result.outcome.slotIndex).toBe(1);
    expect(result.outcome.anchor).toEqual({ column: 2, row: 3 });
    expect(getCellColor(session.getBoard(), at(3, 3))).toBe("red");
    expect(session.drag.isIdle()).toBe(true);
    expect(session.getBlock(1)).toBeNull();
  });

  test("releasing over occupied cells is rejected without changes", () => {
    const session = newSession();
    session.placeBlock(0, at(3, 3));
    grabDomino(session);
    const result = session.releaseDrag({ x: 90, y: 130 }, layout);

    expect(result).toEqual({
      kind: "rejected",
      preview: {
        anchor: { column: 2, row: 3 },
        blockOrigin: { x: 80, y: 120 },
        valid: false,
      },
    });
    expect(session.getBlock(1)?.archetype).toBe("domino");
    expect(session.drag.isIdle()).toBe(true);
    expect(countFilledCells(session.getBoard())).toBe(1);
  });

  test("releasing off the board is rejected", () => {
    const session = newSession();
    grabDomino(session);
    const result = session.releaseDrag({ x: 600, y: 600 }, layout);
    expect(result.kind).toBe("rejected");
    if (result.kind === "rejected") expect(result.preview.anchor).toBeNull();
  });

  test("an empty slot cannot be picked up", () => {
    const session = newSession();
    session.placeBlock(1, at(0, 0));
    expect(
      session.beginDrag(1, { x: 0, y: 0 }, { x: 0, y: 0 }, 20),
    ).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      "[session] beginDrag(1) ignored: slot is empty",
    );
  });

  test("move and release without a drag are ignored", () => {
    const session = newSession();
    expect(session.moveDrag({ x: 0, y: 0 }, layout)).toBeNull();
    expect(session.releaseDrag({ x: 0, y: 0 }, layout)).toEqual({
      kind: "ignored",
    });
  });

  test("a cancelled drag ignores release until it is back in the tray", () => {
    const scheduler = new ManualScheduler();
    const session = newSession({ scheduler });
    grabDomino(session);
    expect(session.cancelDrag()).toHaveLength(1);
    expect(session.releaseDrag({ x: 90, y: 130 }, layout)).toEqual({
      kind: "ignored",
    });
    scheduler.advance(300);
    expect(session.drag.isIdle()).toBe(true);
    expect(countFilledCells(session.getBoard())).toBe(0);
  });

  test("placing a dragged block directly ends the drag", () => {
    const session = newSession();
    grabDomino(session);
    session.placeBlock(1, at(0, 0));
    expect(session.drag.isIdle()).toBe(true);
  });
});

describe("@/engine/session — snapshots", () => {
  test("a snapshot restores the same game", () => {
    const session = newSession();
    session.placeBlock(1, at(4, 4));
    const saved: unknown = JSON.parse(JSON.stringify(session.snapshot()));

    const restored = GameSession.restore(saved, {
      rng: new SequenceRandom([0]),
      settings: { difficulty: "easy" },
    });
    expect(pictureOf(restored.getBoard())).toEqual(
      pictureOf(session.getBoard()),
    );
    expect(restored.getTraySlots()).toEqual(session.getTraySlots());
    expect(restored.getScore()).toEqual(session.getScore());
  });

  test("tray slot count follows the snapshot", () => {
    const session = restoredSession(
      ["....", "....", "....", "...."],
      [block("single"), null],
      { settings: { difficulty: "easy", traySlotCount: 3 } },
    );
    expect(session.getTraySlots()).toHaveLength(2);
  });

  test("a tray that repeats an archetype is rejected", () => {
    expect(() =>
      restoredSession(
        ["..", ".."],
        [block("single"), block("single", 0, "blue")],
      ),
    ).toThrow(InvalidSnapshotError);
  });
});

describe("@/engine/session — difficulty", () => {
  test("a new difficulty applies from the next refill", () => {
    const session = newSession();
    session.setDifficulty("expert");
    expect(archetypes(session)).toEqual(["single", "domino", "line3"]);

    session.placeBlock(0, at(0, 0));
    session.placeBlock(1, at(5, 0));
    const outcome = session.placeBlock(2, at(8, 0));

    expect(outcome.refilled).toBe(true);
    expect(archetypes(session)).toEqual(["domino", "line3", "corner3"]);
  });

  test("a difficulty with too few archetypes for the tray is rejected", () => {
    const session = newSession({
      settings: { difficulty: "medium", traySlotCount: 5 },
    });
    expect(() => {
      session.setDifficulty("easy");
    }).toThrow(EngineError);
    expect(session.getTraySlots()).toHaveLength(5);
  });

  test("a session whose difficulty cannot fill the tray is not created", () => {
    const settings = { difficulty: "easy", traySlotCount: 5 } as const;
    expect(() => new GameSession({ settings })).toThrow(EngineError);
  });
});
