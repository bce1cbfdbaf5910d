/**
 * Run session state (zustand vanilla store)
 *
 * Holds the checkpoint cursors and the transient progress shown on the
 * terminal. Cursor changes are written through to the checkpoint file by a
 * store subscription; flush() is what the signal handler calls.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  advanceCursors,
  type CheckpointCursors,
  type CheckpointFile,
  type CursorName,
} from './checkpoint';
import type { FailureLedger } from './failureLedger';
import type { RunPhaseId, TaskOutcome, TaskStatus } from './pipeline-types';

// Number of recent task durations kept for the ETA
const MAX_TASK_DURATIONS = 10;

export interface CurrentTask {
  /** Pose (or reference) name */
  name: string;
  target: string;
  startedAt: number;
}

export type TaskCounts = Record<TaskStatus, number>;

export interface SessionState {
  cursors: CheckpointCursors;
  /** Size of the list each cursor walks over */
  totals: CheckpointCursors;
  phase: RunPhaseId | null;
  currentTask: CurrentTask | null;
  /** Advisory progress of the running task (0-100) */
  taskProgress: number;
  taskDurations: number[];
  counts: TaskCounts;
  lastOutcome: (TaskOutcome & { name: string; target: string }) | null;

  // Actions
  setPhase: (phase: RunPhaseId | null) => void;
  setTotals: (totals: Partial<CheckpointCursors>) => void;
  advance: (cursor: CursorName) => void;
  startTask: (name: string, target: string) => void;
  setTaskProgress: (percent: number) => void;
  finishTask: (outcome: TaskOutcome, durationMs: number) => void;
}

export type SessionStore = StoreApi<SessionState>;

export function createSessionStore(cursors: CheckpointCursors): SessionStore {
  return createStore<SessionState>()((set) => ({
    cursors,
    totals: { referenceLigand: 0, referenceTarget: 0, ligand: 0, pose: 0, target: 0 },
    phase: null,
    currentTask: null,
    taskProgress: 0,
    taskDurations: [],
    counts: { scored: 0, skipped: 0, failed: 0 },
    lastOutcome: null,

    setPhase: (phase) => set({ phase }),

    setTotals: (totals) => set((state) => ({ totals: { ...state.totals, ...totals } })),

    advance: (cursor) => set((state) => ({ cursors: advanceCursors(state.cursors, cursor) })),

    startTask: (name, target) =>
      set({ currentTask: { name, target, startedAt: Date.now() }, taskProgress: 0 }),

    setTaskProgress: (percent) => set({ taskProgress: Math.max(0, Math.min(100, percent)) }),

    finishTask: (outcome, durationMs) =>
      set((state) => {
        const task = state.currentTask;
        // Skips are instant and would drag the average toward zero
        const taskDurations =
          outcome.status === 'skipped'
            ? state.taskDurations
            : [...state.taskDurations, durationMs].slice(-MAX_TASK_DURATIONS);
        return {
          currentTask: null,
          taskProgress: 0,
          taskDurations,
          counts: { ...state.counts, [outcome.status]: state.counts[outcome.status] + 1 },
          lastOutcome: task ? { ...outcome, name: task.name, target: task.target } : null,
        };
      }),
  }));
}

// ---- Selectors ----

export interface TaskCounter {
  /** 1-based number of the current task within the phase */
  current: number;
  total: number;
}

/**
 * Position within the active phase. The pose phase estimates its total from
 * the current ligand's pose count, since later ligands are not split yet.
 */
export function selectTaskCounter(state: SessionState): TaskCounter {
  const { cursors, totals } = state;
  if (state.phase === 'reference-scoring') {
    return {
      current: cursors.referenceLigand * totals.referenceTarget + cursors.referenceTarget + 1,
      total: totals.referenceLigand * totals.referenceTarget,
    };
  }
  if (state.phase === 'pose-scoring') {
    const perLigand = totals.pose * totals.target;
    return {
      current: cursors.ligand * perLigand + cursors.pose * totals.target + cursors.target + 1,
      total: totals.ligand * perLigand,
    };
  }
  return { current: 0, total: 0 };
}

/** Average of the recent task durations times the tasks left; null until one task has run */
export function selectRemainingMs(state: SessionState): number | null {
  if (state.taskDurations.length === 0) return null;
  const average = state.taskDurations.reduce((sum, d) => sum + d, 0) / state.taskDurations.length;
  const { current, total } = selectTaskCounter(state);
  return average * Math.max(0, total - current + 1);
}

// ---- Session ----

export class RunSession {
  readonly store: SessionStore;
  private readonly checkpoint: CheckpointFile;
  private readonly failures: FailureLedger;
  private readonly unsubscribe: () => void;

  constructor(checkpoint: CheckpointFile, failures: FailureLedger, cursors: CheckpointCursors = checkpoint.load()) {
    this.checkpoint = checkpoint;
    this.failures = failures;
    this.store = createSessionStore(cursors);

    // Persist after every unit of work
    this.unsubscribe = this.store.subscribe((state, prev) => {
      if (state.cursors !== prev.cursors) {
        this.checkpoint.save(state.cursors);
      }
    });
  }

  get state(): SessionState {
    return this.store.getState();
  }

  get cursors(): CheckpointCursors {
    return this.store.getState().cursors;
  }

  advance(cursor: CursorName): void {
    this.store.getState().advance(cursor);
  }

  /** Synchronously write the checkpoint and the failure ledger */
  flush(): void {
    this.checkpoint.save(this.cursors);
    this.failures.flush();
    console.log('[Session] Checkpoint and failure ledger flushed');
  }

  dispose(): void {
    this.unsubscribe();
  }
}
