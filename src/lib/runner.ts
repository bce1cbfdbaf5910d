/**
 * Run orchestrator
 *
 * Builds the run context (catalog, ledgers, checkpointed session), then
 * executes the phases in order. Cancellation arrives through the abort
 * signal; the session is flushed before returning so a restart resumes at
 * the interrupted task.
 */

import { loadCatalog, clearCache, clearEverything, type CatalogEntry } from './catalog';
import { CheckpointFile } from './checkpoint';
import { readTargetOverride, type RunConfig } from './config';
import { checkAborted, formatErrorMessage, isAbortError } from './errors';
import { FailureLedger } from './failureLedger';
import { createWorkspacePaths, type WorkspacePaths } from './paths';
import type { PhaseResult, RunContext, RunPhaseDefinition, RunStatus } from './pipeline-types';
import { nodeProcessLauncher, type ProcessLauncher } from './processes';
import { attachProgressDisplay } from './progress';
import { FileScoreLedger } from './scoreLedger';
import { RunSession } from './session';
import { getRunPhases } from './phases';
import { rankScores } from './phases/ranking';

export interface RunOptions {
  config: RunConfig;
  /** Back up the cache before starting */
  clearCache?: boolean;
  /** Delete cache and results before starting */
  clearEverything?: boolean;
  launcher?: ProcessLauncher;
  signal?: AbortSignal;
  /** Draw the terminal progress frame */
  display?: boolean;
  phases?: RunPhaseDefinition[];
}

export interface RunReport {
  status: Extract<RunStatus, 'completed' | 'cancelled'>;
  results: PhaseResult[];
  failedTasks: number;
}

/** Parse every target's override file up front; a bad one throws ConfigError */
export function checkTargetOverrides(paths: WorkspacePaths, targets: CatalogEntry[]): number {
  let found = 0;
  for (const target of targets) {
    if (readTargetOverride(paths.targetConfigFile(target.name))) found++;
  }
  if (found > 0) console.log(`[Session] ${found} target override files validated`);
  return found;
}

export function createRunContext(config: RunConfig, launcher: ProcessLauncher): RunContext {
  const paths = createWorkspacePaths(config.root);
  const catalog = loadCatalog(paths);
  checkTargetOverrides(paths, catalog.targets);

  const checkpoint = new CheckpointFile(paths.checkpointFile);
  checkpoint.initialize();
  const failures = new FailureLedger(paths.failedTasksFile);
  const session = new RunSession(checkpoint, failures, checkpoint.load());

  return {
    config,
    paths,
    catalog,
    ledger: new FileScoreLedger(paths),
    failures,
    session,
    launcher,
  };
}

export async function runDocking(options: RunOptions): Promise<RunReport> {
  const { config } = options;
  const paths = createWorkspacePaths(config.root);
  const signal = options.signal ?? new AbortController().signal;

  if (options.clearEverything) {
    clearEverything(paths);
  } else if (options.clearCache) {
    clearCache(paths);
  }

  const ctx = createRunContext(config, options.launcher ?? nodeProcessLauncher);
  const { session } = ctx;
  const detachDisplay = options.display
    ? attachProgressDisplay(session.store, { debug: config.debug })
    : () => undefined;

  const results: PhaseResult[] = [];
  console.log(`[Session] Starting run in ${paths.root}`);

  try {
    for (const phase of options.phases ?? getRunPhases()) {
      checkAborted(signal);
      session.store.getState().setPhase(phase.id);
      console.log(`[Session] Phase: ${phase.name}`);

      const result = await phase.execute({
        ...ctx,
        abortSignal: signal,
        onProgress: (percent, message) => {
          if (config.debug && message) console.log(`[Session] ${message} (${percent}%)`);
        },
      });
      results.push(result);
      console.log(`[Session] ${result.summary}`);
    }
  } catch (err) {
    session.flush();
    if (isAbortError(err)) {
      console.log('[Session] Run interrupted; resume by running again');
      return { status: 'cancelled', results, failedTasks: ctx.failures.size };
    }
    console.error(`[Session] Run failed: ${formatErrorMessage(err)}`);
    throw err;
  } finally {
    detachDisplay();
    session.store.getState().setPhase(null);
    session.dispose();
  }

  console.log(`[Session] Run complete; ${ctx.failures.size} failed tasks in ${paths.failedTasksFile}`);
  return { status: 'completed', results, failedTasks: ctx.failures.size };
}

/** Regenerate the rankings from the existing ledgers */
export function runRanking(config: RunConfig): PhaseResult {
  const paths = createWorkspacePaths(config.root);
  const catalog = loadCatalog(paths);
  return rankScores(
    {
      references: catalog.references.map((r) => r.name),
      targets: catalog.targets.map((t) => t.name),
      ledger: new FileScoreLedger(paths),
    },
    paths,
  );
}

/**
 * Abort the returned controller on SIGINT/SIGTERM. A second signal while the
 * run is winding down exits immediately with status 0.
 */
export function installSignalHandlers(controller: AbortController): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(0);
    }
    console.log(`\n[Session] Received ${signal}, stopping after cleanup...`);
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}
