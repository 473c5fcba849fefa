import { type DurationMs, durationMsAsNumber } from "../types/brands";

export type TimerHandle = {
  cancel(): void;
};

/**
 * Fire-once task scheduling. The drag machine defers its cancel reset
 * through this so tests can advance virtual time instead of sleeping.
 */
export type Scheduler = {
  schedule(delay: DurationMs, task: () => void): TimerHandle;
};

export const timeoutScheduler: Scheduler = {
  schedule(delay, task) {
    const id = setTimeout(task, durationMsAsNumber(delay));
    return {
      cancel(): void {
        clearTimeout(id);
      },
    };
  },
};

type PendingTask = {
  id: number;
  dueMs: number;
  task: () => void;
};

// Virtual-time scheduler; tasks run only inside advance()
export class ManualScheduler implements Scheduler {
  private t = 0;
  private nextId = 1;
  private pending: Array<PendingTask> = [];

  schedule(delay: DurationMs, task: () => void): TimerHandle {
    const entry: PendingTask = {
      dueMs: this.t + durationMsAsNumber(delay),
      id: this.nextId++,
      task,
    };
    this.pending.push(entry);
    return {
      cancel: (): void => {
        this.pending = this.pending.filter((p) => p.id !== entry.id);
      },
    };
  }

  nowMs(): number {
    return this.t;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  // Moves time forward, running due tasks in due order
  advance(ms: number): void {
    const target = this.t + ms;
    for (;;) {
      const due = this.pending
        .filter((p) => p.dueMs <= target)
        .sort((a, b) => a.dueMs - b.dueMs || a.id - b.id)[0];
      if (due === undefined) break;
      this.pending = this.pending.filter((p) => p.id !== due.id);
      this.t = due.dueMs;
      due.task();
    }
    this.t = target;
  }
}
