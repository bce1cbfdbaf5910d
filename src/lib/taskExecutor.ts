/**
 * Task Executor
 *
 * Runs one (pose, target) docking task end to end: skip-check against the
 * ledger, docking box, tool launch, log polling, score extraction, ledger or
 * failure append, and artifact placement.
 */

import fs from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import type { CatalogEntry } from './catalog';
import { mergeToolParams, type RunConfig } from './config';
import { resolveDockingBox } from './dockingBox';
import {
  ScoreParseError,
  ToolEnvironmentError,
  checkAborted,
  formatErrorMessage,
  isAbortError,
} from './errors';
import type { FailureLedger } from './failureLedger';
import { ensureDir } from './fsUtils';
import { encodeTaskName, type PoseName } from './naming';
import type { WorkspacePaths } from './paths';
import type { TaskExecutionContext, TaskOutcome } from './pipeline-types';
import type { LaunchedProcess, ProcessLauncher } from './processes';
import { placeArtifacts } from './resultOrganizer';
import { buildToolArgs, monitorLog, parseScoreFromLog, type MonitorResult } from './scoringTool';
import type { ScoreLedger } from './scoreLedger';

export interface DockingTask {
  /** Encoded pose name, as recorded in the ledger */
  name: string;
  pose: PoseName;
  /** Structure file of this pose */
  ligandFile: string;
  target: CatalogEntry;
}

export interface TaskExecutorDeps {
  config: RunConfig;
  paths: WorkspacePaths;
  ledger: ScoreLedger;
  failures: FailureLedger;
  launcher: ProcessLauncher;
}

function removeFiles(files: string[]): void {
  for (const file of files) {
    fs.rmSync(file, { force: true });
  }
}

/** SIGTERM, then SIGKILL once the grace period passes without an exit */
async function terminate(child: LaunchedProcess, graceMs: number): Promise<void> {
  child.kill('SIGTERM');
  const exited = await Promise.race([child.exited.then(() => true), sleep(graceMs, false, { ref: false })]);
  if (!exited) {
    console.warn(`[Dock] Tool ignored SIGTERM for ${graceMs}ms; sending SIGKILL`);
    child.kill('SIGKILL');
    await child.exited;
  }
}

function recordFailure(deps: TaskExecutorDeps, task: DockingTask, reason: string): TaskOutcome {
  const isNew = deps.failures.record({ name: task.name, target: task.target.name, reason });
  console.warn(`[Dock] ${task.name} vs ${task.target.name} failed: ${reason}${isNew ? '' : ' (already recorded)'}`);
  return { status: 'failed', reason };
}

export async function executeTask(
  task: DockingTask,
  deps: TaskExecutorDeps,
  ctx: TaskExecutionContext,
): Promise<TaskOutcome> {
  const { config, paths, ledger, failures, launcher } = deps;
  const target = task.target.name;

  if (ledger.has(target, task.name)) {
    console.log(`[Dock] ${task.name} vs ${target} already scored, skipping`);
    return { status: 'skipped' };
  }
  checkAborted(ctx.abortSignal);

  const resolved = resolveDockingBox(task.target.file, paths.targetConfigFile(target));
  const params = mergeToolParams(config.toolParams, resolved.override);

  const taskName = encodeTaskName({ pose: task.pose, target });
  const logFile = paths.tempArtifact(taskName, 'log');
  const outFile = paths.tempArtifact(taskName, 'structure');
  const tempFiles = [logFile, outFile];

  // Leftovers from an interrupted run would be mistaken for fresh output
  ensureDir(paths.tempDir);
  removeFiles(tempFiles);

  const args = buildToolArgs({ receptor: task.target.file, ligand: task.ligandFile, box: resolved.box, out: outFile, params });
  if (config.debug) {
    console.log(`[Dock] Box from ${resolved.source}${resolved.source === 'centroid' ? ` (${resolved.atomCount} atoms)` : ''}`);
    console.log(`[Dock] ${config.scoringTool} ${args.join(' ')}`);
  }

  ctx.onProgress(0, `Docking ${task.name} against ${target}`);
  const child = launcher.launch(config.scoringTool, args, { logFile });

  let result: MonitorResult;
  try {
    result = await monitorLog({
      logFile,
      exited: child.exited,
      pollIntervalMs: config.pollIntervalMs,
      timeoutMs: config.toolTimeoutMs,
      signal: ctx.abortSignal,
      onProgress: (percent) => ctx.onProgress(percent),
    });
  } catch (err) {
    child.kill('SIGTERM');
    if (isAbortError(err)) {
      removeFiles(tempFiles);
      console.log(`[Dock] ${task.name} vs ${target} interrupted; temporary files removed`);
    }
    throw err;
  }

  let outcome: TaskOutcome;
  if (result.status === 'timeout') {
    await terminate(child, config.killGraceMs);
    const seconds = Math.round(result.elapsedMs / 1000);
    outcome = recordFailure(deps, task, `Timed out after ${seconds}s`);
  } else {
    if (!fs.existsSync(logFile)) {
      throw new ToolEnvironmentError(
        `${config.scoringTool} exited without writing ${logFile}; check the tool installation and permissions`,
      );
    }
    if (result.exit.code !== 0) {
      console.warn(`[Dock] ${config.scoringTool} exited with code ${result.exit.code ?? result.exit.signal}`);
    }

    const content = fs.readFileSync(logFile, 'utf8');
    if (config.debug) {
      console.log(`[Dock] Log for ${taskName}:\n${content}`);
    }

    try {
      const score = parseScoreFromLog(content, `${taskName}.log`);
      ledger.append(target, task.name, score);
      failures.resolve(task.name, target);
      console.log(`[Dock] ${task.name} vs ${target}: ${score}`);
      outcome = { status: 'scored', score };
    } catch (err) {
      if (!(err instanceof ScoreParseError)) throw err;
      outcome = recordFailure(deps, task, formatErrorMessage(err));
    }
  }

  placeArtifacts(paths, task.pose, tempFiles);
  ctx.onProgress(100);
  return outcome;
}
