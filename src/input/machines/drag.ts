/*
 * Drag interaction state machine (robot3)
 *
 * Turns a pointer-down/move/up stream into a block position that never
 * drifts: the finger-to-block-origin offset is captured once on START and
 * the block origin is always `touch - fingerOffset` afterwards.
 *
 * STATE FLOW:
 * idle → active (START)
 * active → active (MOVE) emits DragChanged
 * active → idle (END) emits DragEnded, then clears the session
 * active → active (CANCEL) emits ReturnToTray and marks the session as
 *   returning; the service schedules RESET after the animation duration
 * any → idle (RESET) clears the session immediately
 *
 * While returning, MOVE/END/CANCEL are ignored and START is rejected, since
 * the state has not yet come back to idle.
 *
 * Conventions follow the other robot3 machines: context is immutable,
 * reducers return new objects, actions only emit notifications.
 */

import {
  action,
  createMachine,
  guard,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import {
  DEFAULT_RETURN_TO_TRAY,
  STANDARD_DISPLAY,
  returnToTrayDuration,
} from "../../device/capability";
import { timeoutScheduler } from "../../runtime/scheduler";
import { debugLog } from "../../utils/debug";
import {
  ZERO_VECTOR,
  scaleVector,
  subtractPoints,
  subtractVector,
} from "../types";

import type {
  DisplayCapability,
  ReturnToTrayTiming,
} from "../../device/capability";
import type { BlockInstance } from "../../engine/core/types";
import type { Scheduler, TimerHandle } from "../../runtime/scheduler";
import type { DurationMs } from "../../types/brands";
import type { Point, Vector } from "../types";
import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type DragState = "idle" | "active";

export type DragContext = {
  slotIndex: number | undefined; // tray slot being dragged
  block: BlockInstance | undefined;
  fingerOffset: Vector; // touch - blockOrigin at START, constant afterwards
  sourceCellSize: number; // tray cell size at START
  touch: Point; // latest pointer location
  returning: boolean; // cancel reset scheduled, not yet idle
};

export type ResetReason = "cancelled" | "forced";

export type DragEvent =
  | {
      type: "START";
      slotIndex: number;
      block: BlockInstance;
      touch: Point;
      blockOrigin: Point;
      sourceCellSize: number;
    }
  | { type: "MOVE"; touch: Point }
  | { type: "END"; touch: Point }
  | { type: "CANCEL"; duration: DurationMs }
  | { type: "RESET"; reason: ResetReason };

// Outbound notifications for rendering / preview collaborators
export type DragNotification =
  | {
      kind: "DragStarted";
      slotIndex: number;
      block: BlockInstance;
      touch: Point;
    }
  | {
      kind: "DragChanged";
      slotIndex: number;
      block: BlockInstance;
      touch: Point;
    }
  | {
      kind: "DragEnded";
      slotIndex: number;
      block: BlockInstance;
      touch: Point;
    }
  | {
      kind: "ReturnToTray";
      slotIndex: number;
      block: BlockInstance;
      duration: DurationMs;
    }
  | { kind: "DragReset"; reason: ResetReason };

export const EMPTY_DRAG_CONTEXT: DragContext = {
  block: undefined,
  fingerOffset: ZERO_VECTOR,
  returning: false,
  slotIndex: undefined,
  sourceCellSize: 0,
  touch: { x: 0, y: 0 },
};

// Guards

const isStart = (_ctx: DragContext, event: DragEvent): boolean =>
  event.type === "START";

const isLive = (ctx: DragContext, _event: DragEvent): boolean =>
  !ctx.returning && ctx.block !== undefined;

// Reducers

export const startContext = (
  ctx: DragContext,
  event: DragEvent,
): DragContext => {
  if (event.type !== "START") return ctx;
  return {
    block: event.block,
    fingerOffset: subtractPoints(event.touch, event.blockOrigin),
    returning: false,
    slotIndex: event.slotIndex,
    sourceCellSize: event.sourceCellSize,
    touch: event.touch,
  };
};

export const moveContext = (
  ctx: DragContext,
  event: DragEvent,
): DragContext => {
  if (event.type !== "MOVE" && event.type !== "END") return ctx;
  return { ...ctx, touch: event.touch };
};

export const cancelContext = (
  ctx: DragContext,
  event: DragEvent,
): DragContext => {
  if (event.type !== "CANCEL") return ctx;
  return { ...ctx, returning: true };
};

export const clearContext = (
  _ctx: DragContext,
  _event: DragEvent,
): DragContext => ({ ...EMPTY_DRAG_CONTEXT });

// Actions

type Emit = (notification: DragNotification) => void;

const createDragActions = (
  emit: Emit,
): {
  emitStarted: (ctx: DragContext, event: DragEvent) => void;
  emitChanged: (ctx: DragContext, event: DragEvent) => void;
  emitEnded: (ctx: DragContext, event: DragEvent) => void;
  emitReturn: (ctx: DragContext, event: DragEvent) => void;
  emitReset: (ctx: DragContext, event: DragEvent) => void;
} => ({
  emitChanged: (ctx, event): void => {
    if (event.type !== "MOVE") return;
    if (ctx.block === undefined || ctx.slotIndex === undefined) return;
    emit({
      block: ctx.block,
      kind: "DragChanged",
      slotIndex: ctx.slotIndex,
      touch: event.touch,
    });
  },
  emitEnded: (ctx, event): void => {
    if (event.type !== "END") return;
    if (ctx.block === undefined || ctx.slotIndex === undefined) return;
    emit({
      block: ctx.block,
      kind: "DragEnded",
      slotIndex: ctx.slotIndex,
      touch: event.touch,
    });
  },
  emitReset: (_ctx, event): void => {
    if (event.type !== "RESET") return;
    emit({ kind: "DragReset", reason: event.reason });
  },
  emitReturn: (ctx, event): void => {
    if (event.type !== "CANCEL") return;
    if (ctx.block === undefined || ctx.slotIndex === undefined) return;
    emit({
      block: ctx.block,
      duration: event.duration,
      kind: "ReturnToTray",
      slotIndex: ctx.slotIndex,
    });
  },
  emitStarted: (ctx, event): void => {
    if (event.type !== "START") return;
    emit({
      block: event.block,
      kind: "DragStarted",
      slotIndex: event.slotIndex,
      touch: event.touch,
    });
  },
});

// State builders

type DragActions = ReturnType<typeof createDragActions>;

const createIdleState = (
  actions: DragActions,
): MachineState<DragEvent["type"]> =>
  state<Transition<DragEvent["type"]>>(
    transition(
      "START",
      "active",
      guard(isStart),
      reduce(startContext),
      action(actions.emitStarted),
    ),
    transition("RESET", "idle", reduce(clearContext)),
  );

const createActiveState = (
  actions: DragActions,
): MachineState<DragEvent["type"]> =>
  state<Transition<DragEvent["type"]>>(
    transition(
      "MOVE",
      "active",
      guard(isLive),
      reduce(moveContext),
      action(actions.emitChanged),
    ),
    transition(
      "END",
      "idle",
      guard(isLive),
      action(actions.emitEnded),
      reduce(clearContext),
    ),
    transition(
      "CANCEL",
      "active",
      guard(isLive),
      reduce(cancelContext),
      action(actions.emitReturn),
    ),
    transition(
      "RESET",
      "idle",
      action(actions.emitReset),
      reduce(clearContext),
    ),
  );

type DragEventType = DragEvent["type"];
type DragStatesObject = Record<DragState, MachineState<DragEventType>>;
export type DragMachine = Machine<
  DragStatesObject,
  DragContext,
  DragState,
  DragEventType
>;

export const createDragMachine = (
  initialContext: DragContext,
  emit: Emit,
): DragMachine => {
  const actions = createDragActions(emit);

  const states = {
    active: createActiveState(actions),
    idle: createIdleState(actions),
  } as const;

  // robot3 widens the event type to `string`; cast back so the service
  // keeps the precise state/event typing at this module's boundary.
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<DragStatesObject, DragEventType>,
    (_ctx: DragContext): DragContext => initialContext,
  ) as unknown as DragMachine;
};

type DragService = Service<DragMachine>;

export type DragInteractionOptions = Readonly<{
  capability?: DisplayCapability;
  timing?: ReturnToTrayTiming;
  scheduler?: Scheduler;
}>;

export type DragListener = (notification: DragNotification) => void;

/*
 * DRAG INTERACTION SERVICE - thin wrapper around the robot3 machine
 *
 * Adds what the machine cannot express by itself: the scheduled reset after
 * a cancel, warning-level logging of out-of-order pointer events, and the
 * coordinate helpers renderers call between events.
 */
export class DragInteraction {
  private service: DragService;
  private currentStateName: DragState = "idle";
  private transitioned = false;
  private outbox: Array<DragNotification> = [];
  private listeners = new Set<DragListener>();
  private pendingReset: TimerHandle | null = null;
  private readonly capability: DisplayCapability;
  private readonly timing: ReturnToTrayTiming;
  private readonly scheduler: Scheduler;

  constructor(options: DragInteractionOptions = {}) {
    this.capability = options.capability ?? STANDARD_DISPLAY;
    this.timing = options.timing ?? DEFAULT_RETURN_TO_TRAY;
    this.scheduler = options.scheduler ?? timeoutScheduler;

    const machine = createDragMachine({ ...EMPTY_DRAG_CONTEXT }, (n) => {
      this.outbox.push(n);
    });

    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
      this.transitioned = true;
    });
  }

  subscribe(listener: DragListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  startDrag(
    slotIndex: number,
    block: BlockInstance,
    touch: Point,
    blockOrigin: Point,
    sourceCellSize: number,
  ): ReadonlyArray<DragNotification> {
    const { handled, notifications } = this.dispatch({
      block,
      blockOrigin,
      slotIndex,
      sourceCellSize,
      touch,
      type: "START",
    });
    if (!handled) {
      console.warn(
        `[drag] startDrag(${String(slotIndex)}) ignored: ${this.describeBusy()}`,
      );
    } else {
      debugLog("drag", "started", {
        fingerOffset: this.service.context.fingerOffset,
        slotIndex,
      });
    }
    return notifications;
  }

  updateDrag(touch: Point): ReadonlyArray<DragNotification> {
    const { handled, notifications } = this.dispatch({ touch, type: "MOVE" });
    if (!handled) {
      console.warn(`[drag] updateDrag ignored: ${this.describeIdle()}`);
    }
    return notifications;
  }

  endDrag(touch: Point): ReadonlyArray<DragNotification> {
    const { handled, notifications } = this.dispatch({ touch, type: "END" });
    if (!handled) {
      console.warn(`[drag] endDrag ignored: ${this.describeIdle()}`);
    }
    return notifications;
  }

  /**
   * Ask the renderer to animate the block back to the tray. The session
   * stays active until the animation duration has elapsed; only then does
   * state return to idle.
   */
  cancelDrag(): ReadonlyArray<DragNotification> {
    const duration = returnToTrayDuration(this.capability, this.timing);
    const { handled, notifications } = this.dispatch({
      duration,
      type: "CANCEL",
    });
    if (!handled) {
      console.warn(`[drag] cancelDrag ignored: ${this.describeIdle()}`);
      return notifications;
    }
    this.pendingReset = this.scheduler.schedule(duration, () => {
      this.pendingReset = null;
      this.dispatch({ reason: "cancelled", type: "RESET" });
    });
    return notifications;
  }

  // Immediate, from any state; drops a pending cancel reset
  reset(): ReadonlyArray<DragNotification> {
    this.clearPendingReset();
    return this.dispatch({ reason: "forced", type: "RESET" }).notifications;
  }

  getState(): { state: DragState; context: DragContext } {
    return { context: this.service.context, state: this.currentStateName };
  }

  isIdle(): boolean {
    return this.currentStateName === "idle";
  }

  isActive(): boolean {
    return this.currentStateName === "active";
  }

  isReturning(): boolean {
    return this.service.context.returning;
  }

  isBlockDragged(slotIndex: number): boolean {
    return this.isActive() && this.service.context.slotIndex === slotIndex;
  }

  draggedSlot(): number | undefined {
    return this.service.context.slotIndex;
  }

  draggedBlock(): BlockInstance | undefined {
    return this.service.context.block;
  }

  getFingerOffset(): Vector {
    return this.service.context.fingerOffset;
  }

  getTouch(): Point {
    return this.service.context.touch;
  }

  // touch - fingerOffset; null when no drag is active
  getBlockOrigin(): Point | null {
    if (!this.isActive()) return null;
    const { fingerOffset, touch } = this.service.context;
    return subtractVector(touch, fingerOffset);
  }

  /**
   * Finger offset rescaled from the tray's cell size to `targetCellSize`.
   * Returns the unscaled offset when either size is not positive.
   */
  getScaledFingerOffset(targetCellSize: number): Vector {
    const { fingerOffset, sourceCellSize } = this.service.context;
    if (!(targetCellSize > 0) || !(sourceCellSize > 0)) return fingerOffset;
    return scaleVector(fingerOffset, targetCellSize / sourceCellSize);
  }

  private dispatch(event: DragEvent): {
    handled: boolean;
    notifications: ReadonlyArray<DragNotification>;
  } {
    this.transitioned = false;
    this.outbox = [];
    this.service.send(event);
    const notifications = this.outbox;
    this.outbox = [];
    for (const n of notifications) {
      for (const listener of this.listeners) listener(n);
    }
    return { handled: this.transitioned, notifications };
  }

  private clearPendingReset(): void {
    if (this.pendingReset !== null) {
      this.pendingReset.cancel();
      this.pendingReset = null;
    }
  }

  private describeBusy(): string {
    return this.isReturning()
      ? "previous drag is still returning to the tray"
      : `slot ${String(this.service.context.slotIndex)} is already being dragged`;
  }

  private describeIdle(): string {
    return this.isReturning()
      ? "drag is returning to the tray"
      : "no drag is active";
  }
}
