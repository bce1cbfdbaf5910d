import type { InputCatalog } from './catalog';
import type { RunConfig } from './config';
import type { FailureLedger } from './failureLedger';
import type { WorkspacePaths } from './paths';
import type { ProcessLauncher } from './processes';
import type { ScoreLedger } from './scoreLedger';
import type { RunSession } from './session';

// ---- Task Outcome ----

/** What happened to one (pose, target) task */
export type TaskOutcome =
  | { status: 'scored'; score: number }
  | { status: 'skipped' }       // Already in the ledger
  | { status: 'failed'; reason: string };

export type TaskStatus = TaskOutcome['status'];

// ---- Task Execution ----

/** Context passed into every task execution */
export interface TaskExecutionContext {
  /** Signal for cancellation */
  abortSignal: AbortSignal;
  /** Callback for advisory progress within a task (0-100) */
  onProgress: (percent: number, message?: string) => void;
}

// ---- Run Context ----

/** Everything a phase needs, built once per run */
export interface RunContext {
  config: RunConfig;
  paths: WorkspacePaths;
  catalog: InputCatalog;
  ledger: ScoreLedger;
  failures: FailureLedger;
  session: RunSession;
  launcher: ProcessLauncher;
}

export interface PhaseExecutionContext extends RunContext {
  abortSignal: AbortSignal;
  onProgress: (percent: number, message?: string) => void;
}

// ---- Phase Definition ----

export type RunPhaseId = 'reference-scoring' | 'pose-scoring' | 'ranking';

export interface PhaseResult {
  phaseId: RunPhaseId;
  /** Human-readable summary */
  summary: string;
  /** Counters for the final report */
  data?: Record<string, number>;
}

/** Static definition of a single run phase */
export interface RunPhaseDefinition {
  id: RunPhaseId;
  /** Display name */
  name: string;
  description: string;
  /** Execute the phase. Throws on fatal failure or cancellation. */
  execute: (ctx: PhaseExecutionContext) => Promise<PhaseResult>;
}

/** Overall run status */
export type RunStatus = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';
