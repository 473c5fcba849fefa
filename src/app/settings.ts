// Engine settings: defaults, tolerant parsing of untrusted input, and merge.
// Storage is the host's concern; this module only sees plain values/JSON.

import {
  DEFAULT_RETURN_TO_TRAY,
  type ReturnToTrayTiming,
} from "../device/capability";
import { DEFAULT_BOARD_SIZE, DEFAULT_TRAY_SLOTS } from "../engine/core/types";
import { EngineError } from "../engine/errors";
import { DEFAULT_REFILL_ATTEMPTS } from "../engine/tray/dispenser";
import {
  DIFFICULTIES,
  DIFFICULTY_PROFILES,
  type Difficulty,
  eligibleArchetypes,
  isDifficulty,
} from "../engine/tray/difficulty";
import { createDurationMs, createSeed, type Seed } from "../types/brands";

export type EngineSettings = Readonly<{
  boardSize: number;
  traySlotCount: number;
  difficulty: Difficulty;
  seed: Seed;
  refillAttempts: number;
  returnToTray: ReturnToTrayTiming;
}>;

export const DEFAULT_SETTINGS: EngineSettings = {
  boardSize: DEFAULT_BOARD_SIZE,
  difficulty: "medium",
  refillAttempts: DEFAULT_REFILL_ATTEMPTS,
  returnToTray: DEFAULT_RETURN_TO_TRAY,
  seed: createSeed("default"),
  traySlotCount: DEFAULT_TRAY_SLOTS,
};

const MAX_BOARD_SIZE = 32;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function isIntInRange(x: unknown, min: number, max: number): x is number {
  return isNumber(x) && Number.isInteger(x) && x >= min && x <= max;
}

function coerceDifficulty(u: unknown): Difficulty | undefined {
  if (isDifficulty(u)) return u;
  // older saves stored the difficulty as its index (0=easy .. 3=expert)
  if (isIntInRange(u, 0, DIFFICULTIES.length - 1)) return DIFFICULTIES[u];
  const lower = isString(u) ? u.toLowerCase() : undefined;
  return isDifficulty(lower) ? lower : undefined;
}

function parseTiming(u: unknown): ReturnToTrayTiming | undefined {
  if (!isRecord(u)) return undefined;
  const fast = u["fastMs"];
  const slow = u["slowMs"];
  const threshold = u["highRefreshThresholdHz"];
  try {
    return {
      fastMs: isNumber(fast)
        ? createDurationMs(fast)
        : DEFAULT_RETURN_TO_TRAY.fastMs,
      highRefreshThresholdHz:
        isNumber(threshold) && threshold > 0
          ? threshold
          : DEFAULT_RETURN_TO_TRAY.highRefreshThresholdHz,
      slowMs: isNumber(slow)
        ? createDurationMs(slow)
        : DEFAULT_RETURN_TO_TRAY.slowMs,
    };
  } catch (error) {
    console.warn("[settings] Invalid return-to-tray timing:", error);
    return undefined;
  }
}

/**
 * Field-by-field validation of an untrusted object. Invalid fields are
 * dropped with a warning; unknown fields are ignored.
 */
export function parseSettings(raw: unknown): Partial<EngineSettings> {
  if (!isRecord(raw)) return {};
  const out: {
    -readonly [K in keyof EngineSettings]?: EngineSettings[K];
  } = {};

  const {
    boardSize,
    difficulty,
    refillAttempts,
    returnToTray,
    seed,
    traySlotCount,
  } = raw;

  if (boardSize !== undefined) {
    if (isIntInRange(boardSize, 1, MAX_BOARD_SIZE)) out.boardSize = boardSize;
    else console.warn("[settings] Invalid board size:", boardSize);
  }

  if (traySlotCount !== undefined) {
    if (isIntInRange(traySlotCount, 1, 8)) out.traySlotCount = traySlotCount;
    else console.warn("[settings] Invalid tray slot count:", traySlotCount);
  }

  if (difficulty !== undefined) {
    const d = coerceDifficulty(difficulty);
    if (d !== undefined) out.difficulty = d;
    else console.warn("[settings] Invalid difficulty:", difficulty);
  }

  if (seed !== undefined) {
    if (isString(seed) && seed.length > 0) out.seed = createSeed(seed);
    else console.warn("[settings] Invalid seed:", seed);
  }

  if (refillAttempts !== undefined) {
    if (isIntInRange(refillAttempts, 1, 100)) {
      out.refillAttempts = refillAttempts;
    } else {
      console.warn("[settings] Invalid refill attempts:", refillAttempts);
    }
  }

  if (returnToTray !== undefined) {
    const timing = parseTiming(returnToTray);
    if (timing !== undefined) out.returnToTray = timing;
  }

  return out;
}

// Parse a JSON document; null or malformed input yields no overrides
export function loadSettings(json: string | null): Partial<EngineSettings> {
  if (json === null) return {};
  try {
    const parsed: unknown = JSON.parse(json);
    return parseSettings(parsed);
  } catch (error) {
    console.warn("[settings] Failed to parse settings JSON:", error);
    return {};
  }
}

/**
 * Merge overrides over the defaults. Each refill offers distinct archetypes,
 * so the difficulty must admit at least one archetype per tray slot.
 */
export function resolveSettings(
  overrides: Partial<EngineSettings> = {},
): EngineSettings {
  const settings = { ...DEFAULT_SETTINGS, ...overrides };
  const admitted = eligibleArchetypes(
    DIFFICULTY_PROFILES[settings.difficulty],
  ).length;
  if (settings.traySlotCount > admitted) {
    throw new EngineError(
      `Difficulty ${settings.difficulty} admits ${String(admitted)} archetypes; ${String(settings.traySlotCount)} tray slots need as many distinct ones`,
    );
  }
  return settings;
}
