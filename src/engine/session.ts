import { resolveSettings, type EngineSettings } from "../app/settings";
import { STANDARD_DISPLAY, type DisplayCapability } from "../device/capability";
import { anchorForOrigin, type BoardLayout } from "../input/board-layout";
import { DragInteraction } from "../input/machines/drag";
import { subtractVector } from "../input/types";
import { timeoutScheduler, type Scheduler } from "../runtime/scheduler";
import { seedAsString } from "../types/brands";
import { debugLog } from "../utils/debug";

import {
  canPlace,
  commitPlacement,
  createEmptyBoard,
  hasAnyValidPlacement,
} from "./core/board";
import { createSeededRandom } from "./core/rng/seeded";
import { EngineError, InvalidSlotError, InvalidSnapshotError } from "./errors";
import {
  createScoreTracker,
  defaultScorePolicy,
  recordPlacement,
  resetScore,
} from "./scoring/score";
import { createSnapshot, restoreSnapshot } from "./snapshot";
import { DIFFICULTY_PROFILES } from "./tray/difficulty";
import { TrayDispenser } from "./tray/dispenser";

import type { PlacementResult } from "./core/board";
import type { RandomGenerator } from "./core/rng/interface";
import type { BlockInstance, Board, GridCoordinate } from "./core/types";
import type { DomainEvent } from "./events";
import type {
  ScoreBreakdown,
  ScorePolicy,
  ScoreTracker,
} from "./scoring/score";
import type { GameSnapshot, RestoredState } from "./snapshot";
import type { Difficulty } from "./tray/difficulty";
import type { TraySlot } from "./tray/dispenser";
import type { DragNotification } from "../input/machines/drag";
import type { Point } from "../input/types";

export type GameSessionOptions = Readonly<{
  settings?: Partial<EngineSettings>;
  scorePolicy?: ScorePolicy;
  capability?: DisplayCapability;
  scheduler?: Scheduler;
  // defaults to a generator seeded from settings.seed
  rng?: RandomGenerator;
  bestScore?: number;
}>;

export type PlacementOutcome = Readonly<{
  slotIndex: number;
  block: BlockInstance;
  anchor: GridCoordinate;
  placement: PlacementResult;
  score: ScoreBreakdown;
  refilled: boolean;
  gameOver: boolean;
  events: ReadonlyArray<DomainEvent>;
}>;

// Where the dragged block would land if released now
export type PlacementPreview = Readonly<{
  blockOrigin: Point;
  anchor: GridCoordinate | null;
  valid: boolean;
}>;

export type ReleaseOutcome =
  | { kind: "placed"; outcome: PlacementOutcome }
  // drag ended off the board or over occupied cells; the view snaps back
  | { kind: "rejected"; preview: PlacementPreview }
  | { kind: "ignored" };

export type SessionListener = (event: DomainEvent) => void;

/**
 * One game: board, tray, score and the single drag interaction. Placement
 * is atomic; a rejected placement leaves every part of the session as it
 * was. The session is over once no offered block fits anywhere.
 */
export class GameSession {
  readonly settings: EngineSettings;
  readonly drag: DragInteraction;
  private board: Board;
  private score: ScoreTracker;
  private over = false;
  private readonly tray: TrayDispenser;
  private readonly scorePolicy: ScorePolicy;
  private readonly listeners = new Set<SessionListener>();

  constructor(options: GameSessionOptions = {}, restored?: RestoredState) {
    this.settings = resolveSettings(options.settings);
    this.scorePolicy = options.scorePolicy ?? defaultScorePolicy;
    this.board = restored?.board ?? createEmptyBoard(this.settings.boardSize);
    this.score =
      restored?.score ??
      createScoreTracker(Math.max(0, options.bestScore ?? 0));
    this.drag = new DragInteraction({
      capability: options.capability ?? STANDARD_DISPLAY,
      scheduler: options.scheduler ?? timeoutScheduler,
      timing: this.settings.returnToTray,
    });
    this.tray = new TrayDispenser({
      getBoard: () => this.board,
      profile: DIFFICULTY_PROFILES[this.settings.difficulty],
      refillAttempts: this.settings.refillAttempts,
      rng: options.rng ?? createSeededRandom(seedAsString(this.settings.seed)),
      slotCount: this.settings.traySlotCount,
      ...(restored !== undefined ? { slots: restored.slots } : {}),
    });
    this.over = this.computeGameOver();
  }

  /**
   * Rebuild a session from a persisted snapshot. Board size and tray slot
   * count come from the snapshot, overriding any in `options.settings`.
   */
  static restore(raw: unknown, options: GameSessionOptions = {}): GameSession {
    const restored = restoreSnapshot(raw);
    const settings: Partial<EngineSettings> = {
      ...options.settings,
      boardSize: restored.board.size,
      traySlotCount: restored.slots.length,
    };
    try {
      return new GameSession({ ...options, settings }, restored);
    } catch (error) {
      if (error instanceof EngineError) throw error;
      throw new InvalidSnapshotError(
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getBoard(): Board {
    return this.board;
  }

  getTraySlots(): ReadonlyArray<TraySlot> {
    return this.tray.getTraySlots();
  }

  getBlock(slotIndex: number): BlockInstance | null {
    return this.tray.getBlock(slotIndex);
  }

  getScore(): ScoreTracker {
    return this.score;
  }

  isGameOver(): boolean {
    return this.over;
  }

  canPlace(slotIndex: number, at: GridCoordinate): boolean {
    const block = this.tray.getBlock(slotIndex);
    return block !== null && canPlace(this.board, block, at);
  }

  // Takes effect at the next tray refill
  setDifficulty(difficulty: Difficulty): void {
    this.tray.setProfile(DIFFICULTY_PROFILES[difficulty]);
  }

  /**
   * Place the block in `slotIndex` with its top-left cell at `anchor`,
   * clear completed lines, score, and consume the slot.
   * Throws InvalidSlotError or InvalidPlacementError without changing
   * anything.
   */
  placeBlock(slotIndex: number, anchor: GridCoordinate): PlacementOutcome {
    if (this.over) {
      throw new EngineError("Game is over; restart to continue");
    }
    const block = this.tray.getBlock(slotIndex);
    if (block === null) {
      const inRange =
        Number.isInteger(slotIndex) &&
        slotIndex >= 0 &&
        slotIndex < this.tray.getSlotCount();
      throw new InvalidSlotError(slotIndex, inRange ? "empty" : "out-of-range");
    }

    const placement = commitPlacement(this.board, block, anchor);
    const breakdown = this.scorePolicy({
      cellsPlaced: placement.cellsPlaced,
      linesCleared: placement.linesCleared,
    });

    if (this.drag.isBlockDragged(slotIndex)) this.drag.reset();

    this.board = placement.board;
    this.score = recordPlacement(this.score, breakdown);
    const consumed = this.tray.consumeBlock(slotIndex);
    this.over = this.computeGameOver();

    const events: Array<DomainEvent> = [
      {
        anchor,
        archetype: block.archetype,
        cells: placement.placedCells,
        color: block.color,
        kind: "BlockPlaced",
        slotIndex,
      },
    ];
    if (placement.linesCleared > 0) {
      events.push({
        cells: placement.clearedCells,
        columns: placement.clearedColumns,
        kind: "LinesCleared",
        rows: placement.clearedRows,
      });
    }
    events.push(
      {
        best: this.score.best,
        breakdown,
        kind: "ScoreChanged",
        total: this.score.total,
      },
      { kind: "SlotConsumed", slotIndex },
    );
    if (consumed.refilled) {
      events.push({
        kind: "TrayRefilled",
        reason: "exhausted",
        slots: consumed.slots,
      });
    }
    if (this.over) {
      events.push({
        best: this.score.best,
        kind: "GameOver",
        score: this.score.total,
      });
    }

    debugLog("session", "placed", {
      anchor,
      archetype: block.archetype,
      lines: placement.linesCleared,
      total: this.score.total,
    });
    this.emit(events);

    return {
      anchor,
      block,
      events,
      gameOver: this.over,
      placement,
      refilled: consumed.refilled,
      score: breakdown,
      slotIndex,
    };
  }

  // Empty board, zero score (best kept), fresh tray
  restart(): ReadonlyArray<DomainEvent> {
    this.drag.reset();
    this.board = createEmptyBoard(this.settings.boardSize);
    this.score = resetScore(this.score);
    const slots = this.tray.resetTray();
    this.over = this.computeGameOver();

    const events: Array<DomainEvent> = [
      { boardSize: this.board.size, kind: "GameStarted" },
      { kind: "TrayRefilled", reason: "restart", slots },
    ];
    this.emit(events);
    return events;
  }

  /**
   * Pick up the block in `slotIndex`. `blockOrigin` is where its top-left
   * is drawn in the tray and `trayCellSize` the cell size it is drawn at.
   * Returns false when the slot is empty or a drag is already running.
   */
  beginDrag(
    slotIndex: number,
    touch: Point,
    blockOrigin: Point,
    trayCellSize: number,
  ): boolean {
    if (this.over) return false;
    const block = this.tray.getBlock(slotIndex);
    if (block === null) {
      console.warn(
        `[session] beginDrag(${String(slotIndex)}) ignored: slot is empty`,
      );
      return false;
    }
    return (
      this.drag.startDrag(slotIndex, block, touch, blockOrigin, trayCellSize)
        .length > 0
    );
  }

  // Null when no live drag is running
  moveDrag(touch: Point, layout: BoardLayout): PlacementPreview | null {
    if (this.drag.updateDrag(touch).length === 0) return null;
    return this.preview(layout);
  }

  /**
   * Drop the dragged block. Its on-board origin is the touch minus the
   * finger offset rescaled to the board's cell size; the nearest cell
   * corner becomes the anchor.
   */
  releaseDrag(touch: Point, layout: BoardLayout): ReleaseOutcome {
    if (!this.drag.isActive() || this.drag.isReturning()) {
      this.drag.endDrag(touch);
      return { kind: "ignored" };
    }
    // Preview before ending: the end clears the drag context
    this.drag.updateDrag(touch);
    const preview = this.preview(layout);
    const slotIndex = this.drag.draggedSlot();
    this.drag.endDrag(touch);

    if (slotIndex === undefined || !preview.valid || preview.anchor === null) {
      return { kind: "rejected", preview };
    }
    return {
      kind: "placed",
      outcome: this.placeBlock(slotIndex, preview.anchor),
    };
  }

  cancelDrag(): ReadonlyArray<DragNotification> {
    return this.drag.cancelDrag();
  }

  snapshot(): GameSnapshot {
    return createSnapshot(this.board, this.tray.getTraySlots(), this.score);
  }

  private preview(layout: BoardLayout): PlacementPreview {
    const offset = this.drag.getScaledFingerOffset(layout.cellSize);
    const blockOrigin = subtractVector(this.drag.getTouch(), offset);
    const anchor = anchorForOrigin(layout, blockOrigin, this.board.size);
    const block = this.drag.draggedBlock();
    const valid =
      anchor !== null &&
      block !== undefined &&
      canPlace(this.board, block, anchor);
    return { anchor, blockOrigin, valid };
  }

  private computeGameOver(): boolean {
    return !this.tray
      .occupiedBlocks()
      .some((b) => hasAnyValidPlacement(this.board, b));
  }

  private emit(events: ReadonlyArray<DomainEvent>): void {
    for (const e of events) {
      for (const listener of this.listeners) listener(e);
    }
  }
}
