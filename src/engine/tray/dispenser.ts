import { debugLog } from "../../utils/debug";
import { createBlockInstance } from "../core/block";
import { hasAnyValidPlacement } from "../core/board";
import { pickOne, sampleDistinct } from "../core/rng/sampling";
import { variations } from "../core/shapes";
import { BLOCK_COLORS } from "../core/types";
import { EngineError, InvalidSlotError } from "../errors";

import { eligibleArchetypes } from "./difficulty";

import type { RandomGenerator } from "../core/rng/interface";
import type { ArchetypeId, BlockInstance, Board } from "../core/types";
import type { DifficultyProfile } from "./difficulty";

export type TraySlot = BlockInstance | null;

export const DEFAULT_REFILL_ATTEMPTS = 8;

// Always placeable on any board with one empty cell
const FALLBACK_ARCHETYPE: ArchetypeId = "single";

export type TrayDispenserOptions = Readonly<{
  slotCount: number;
  profile: DifficultyProfile;
  rng: RandomGenerator;
  // current board, read at every refill for the liveness check
  getBoard: () => Board;
  refillAttempts?: number;
  // initial contents (restore); generated when omitted
  slots?: ReadonlyArray<TraySlot>;
}>;

export type ConsumeResult = Readonly<{
  block: BlockInstance;
  slotIndex: number;
  refilled: boolean;
  slots: ReadonlyArray<TraySlot>;
}>;

/**
 * Keeps a fixed number of block offers. Slots empty one at a time as blocks
 * are placed and the whole tray is regenerated only once all are empty.
 * A fresh tray never repeats an archetype and, on any board with room,
 * always holds at least one block that fits somewhere.
 */
export class TrayDispenser {
  private slots: Array<TraySlot>;
  private rng: RandomGenerator;
  private profile: DifficultyProfile;
  private readonly slotCount: number;
  private readonly refillAttempts: number;
  private readonly getBoard: () => Board;

  constructor(options: TrayDispenserOptions) {
    if (!Number.isInteger(options.slotCount) || options.slotCount <= 0) {
      throw new Error("Tray slot count must be a positive integer");
    }
    this.slotCount = options.slotCount;
    this.refillAttempts = Math.max(
      1,
      Math.floor(options.refillAttempts ?? DEFAULT_REFILL_ATTEMPTS),
    );
    this.getBoard = options.getBoard;
    this.rng = options.rng;
    this.profile = options.profile;
    this.assertProfileCoversTray(options.profile);

    if (options.slots !== undefined) {
      this.slots = this.validateSlots(options.slots);
    } else {
      this.slots = this.generate();
    }
  }

  getTraySlots(): ReadonlyArray<TraySlot> {
    return [...this.slots];
  }

  getSlotCount(): number {
    return this.slotCount;
  }

  // Probing: out-of-range and empty slots both read as null
  getBlock(slotIndex: number): BlockInstance | null {
    if (!this.isValidIndex(slotIndex)) return null;
    return this.slots[slotIndex] ?? null;
  }

  isEmpty(): boolean {
    return this.slots.every((s) => s === null);
  }

  occupiedBlocks(): ReadonlyArray<BlockInstance> {
    return this.slots.filter((s): s is BlockInstance => s !== null);
  }

  /**
   * Empty exactly one slot. When that leaves every slot empty the tray is
   * regenerated against the current board before returning.
   */
  consumeBlock(slotIndex: number): ConsumeResult {
    if (!this.isValidIndex(slotIndex)) {
      throw new InvalidSlotError(slotIndex, "out-of-range");
    }
    const block = this.slots[slotIndex] ?? null;
    if (block === null) {
      throw new InvalidSlotError(slotIndex, "empty");
    }

    this.slots[slotIndex] = null;
    let refilled = false;
    if (this.isEmpty()) {
      this.slots = this.generate();
      refilled = true;
    }

    return { block, refilled, slotIndex, slots: this.getTraySlots() };
  }

  // Regenerate regardless of occupancy (restarts)
  resetTray(): ReadonlyArray<TraySlot> {
    this.slots = this.generate();
    return this.getTraySlots();
  }

  // Takes effect at the next refill
  setProfile(profile: DifficultyProfile): void {
    this.assertProfileCoversTray(profile);
    this.profile = profile;
  }

  private isValidIndex(slotIndex: number): boolean {
    return (
      Number.isInteger(slotIndex) &&
      slotIndex >= 0 &&
      slotIndex < this.slotCount
    );
  }

  private assertProfileCoversTray(profile: DifficultyProfile): void {
    const eligible = eligibleArchetypes(profile);
    if (eligible.length < this.slotCount) {
      throw new EngineError(
        `Difficulty admits ${String(eligible.length)} archetypes but the tray has ${String(this.slotCount)} slots`,
      );
    }
  }

  private validateSlots(slots: ReadonlyArray<TraySlot>): Array<TraySlot> {
    if (slots.length !== this.slotCount) {
      throw new Error(
        `Expected ${String(this.slotCount)} tray slots, got ${String(slots.length)}`,
      );
    }
    const seen = new Set<ArchetypeId>();
    for (const slot of slots) {
      if (slot === null) continue;
      if (seen.has(slot.archetype)) {
        throw new Error(`Archetype ${slot.archetype} appears twice in tray`);
      }
      seen.add(slot.archetype);
    }
    if (seen.size === 0) return this.generate();
    return [...slots];
  }

  private drawInstance(archetype: ArchetypeId): BlockInstance {
    const v = pickOne(this.rng, variations(archetype));
    const c = pickOne(v.newRng, BLOCK_COLORS);
    this.rng = c.newRng;
    return createBlockInstance(v.item, c.item);
  }

  private drawSet(): Array<BlockInstance> {
    const { newRng, picked } = sampleDistinct(
      this.rng,
      eligibleArchetypes(this.profile),
      this.slotCount,
    );
    this.rng = newRng;
    return picked.map((id) => this.drawInstance(id));
  }

  private generate(): Array<TraySlot> {
    const board = this.getBoard();
    let last: Array<BlockInstance> = [];

    for (let attempt = 1; attempt <= this.refillAttempts; attempt++) {
      last = this.drawSet();
      if (last.some((b) => hasAnyValidPlacement(board, b))) {
        debugLog("tray", "refilled", {
          attempt,
          archetypes: last.map((b) => b.archetype),
        });
        return last;
      }
    }

    if (last.some((b) => b.archetype === FALLBACK_ARCHETYPE)) return last;

    console.warn(
      `[tray] no placeable draw after ${String(this.refillAttempts)} attempts; offering ${FALLBACK_ARCHETYPE}`,
    );
    const fallback = this.drawInstance(FALLBACK_ARCHETYPE);
    return [...last.slice(0, -1), fallback];
  }
}
