// Public surface of the engine. Renderers, input adapters and persistence
// live in the host and talk to the engine only through these exports.

export {
  DEFAULT_SETTINGS,
  loadSettings,
  parseSettings,
  resolveSettings,
  type EngineSettings,
} from "./app/settings";
export {
  DEFAULT_RETURN_TO_TRAY,
  STANDARD_DISPLAY,
  isHighRefresh,
  returnToTrayDuration,
  type DisplayCapability,
  type ReturnToTrayTiming,
} from "./device/capability";
export {
  blockFromCatalog,
  createBlockInstance,
  fitsBoard,
  fitsWithin,
  placedCells,
} from "./engine/core/block";
export {
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
  type ClearedCell,
  type PlacementResult,
} from "./engine/core/board";
export { type RandomGenerator } from "./engine/core/rng/interface";
export { SeededRandom, createSeededRandom } from "./engine/core/rng/seeded";
export { SequenceRandom } from "./engine/core/rng/sequence";
export {
  ARCHETYPE_IDS,
  ARCHETYPES,
  LEGACY_ALIASES,
  decodeArchetype,
  findVariationIndex,
  getArchetype,
  getVariation,
  isArchetypeId,
  validateCatalog,
  variations,
} from "./engine/core/shapes";
export {
  BLOCK_COLORS,
  DEFAULT_BOARD_SIZE,
  DEFAULT_TRAY_SLOTS,
  assertBlockColor,
  assertGridCoordinate,
  createGridCoordinate,
  gridCoordinateEquals,
  isBlockColor,
  isGridCoordinate,
  isInBounds,
  tryGridCoordinate,
  type ArchetypeId,
  type BlockColor,
  type BlockInstance,
  type Board,
  type GridCoordinate,
  type ShapeArchetype,
  type ShapeVariation,
} from "./engine/core/types";
export {
  EngineError,
  InvalidPlacementError,
  InvalidSlotError,
  InvalidSnapshotError,
  OutOfBoundsError,
  UnknownArchetypeError,
} from "./engine/errors";
export { type DomainEvent } from "./engine/events";
export {
  createScoreTracker,
  defaultScorePolicy,
  lineClearBonus,
  recordPlacement,
  type ScoreBreakdown,
  type ScorePolicy,
  type ScoreTracker,
} from "./engine/scoring/score";
export {
  GameSession,
  type GameSessionOptions,
  type PlacementOutcome,
  type PlacementPreview,
  type ReleaseOutcome,
} from "./engine/session";
export {
  SNAPSHOT_VERSION,
  createSnapshot,
  restoreSnapshot,
  type GameSnapshot,
} from "./engine/snapshot";
export {
  DIFFICULTIES,
  DIFFICULTY_PROFILES,
  type Difficulty,
} from "./engine/tray/difficulty";
export { TrayDispenser, type TraySlot } from "./engine/tray/dispenser";
export {
  anchorForOrigin,
  cellAtPoint,
  cellToPoint,
  type BoardLayout,
} from "./input/board-layout";
export {
  DragInteraction,
  type DragNotification,
  type DragState,
} from "./input/machines/drag";
export { type Point, type Vector } from "./input/types";
export {
  ManualScheduler,
  timeoutScheduler,
  type Scheduler,
} from "./runtime/scheduler";
export { assertSeed, createSeed, isSeed, type Seed } from "./types/brands";
export { setDebugTopics } from "./utils/debug";
