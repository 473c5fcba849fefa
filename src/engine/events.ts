import type { ClearedCell } from "./core/board";
import type { ArchetypeId, BlockColor, GridCoordinate } from "./core/types";
import type { ScoreBreakdown } from "./scoring/score";
import type { TraySlot } from "./tray/dispenser";

export type DomainEvent =
  | { kind: "GameStarted"; boardSize: number }
  | {
      kind: "BlockPlaced";
      slotIndex: number;
      archetype: ArchetypeId;
      color: BlockColor;
      anchor: GridCoordinate;
      cells: ReadonlyArray<GridCoordinate>;
    }
  | {
      kind: "LinesCleared";
      rows: ReadonlyArray<number>;
      columns: ReadonlyArray<number>;
      cells: ReadonlyArray<ClearedCell>;
    }
  | {
      kind: "ScoreChanged";
      breakdown: ScoreBreakdown;
      total: number;
      best: number;
    }
  | { kind: "SlotConsumed"; slotIndex: number }
  | {
      kind: "TrayRefilled";
      reason: "exhausted" | "restart";
      slots: ReadonlyArray<TraySlot>;
    }
  | { kind: "GameOver"; score: number; best: number };
