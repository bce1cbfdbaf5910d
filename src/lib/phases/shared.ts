/**
 * Helpers shared by the scoring phases.
 */

import type { PhaseExecutionContext, TaskOutcome } from '@/lib/pipeline-types';
import { executeTask, type DockingTask } from '@/lib/taskExecutor';

/** Run one task with session bookkeeping around it */
export async function runDockingTask(ctx: PhaseExecutionContext, task: DockingTask): Promise<TaskOutcome> {
  const store = ctx.session.store;
  const startedAt = Date.now();
  store.getState().startTask(task.name, task.target.name);

  const outcome = await executeTask(task, ctx, {
    abortSignal: ctx.abortSignal,
    onProgress: (percent, message) => {
      store.getState().setTaskProgress(percent);
      ctx.onProgress(percent, message);
    },
  });

  store.getState().finishTask(outcome, Date.now() - startedAt);
  return outcome;
}

export function summarizeCounts(counts: Record<TaskOutcome['status'], number>): string {
  return `${counts.scored} scored, ${counts.skipped} skipped, ${counts.failed} failed`;
}

export function emptyCounts(): Record<TaskOutcome['status'], number> {
  return { scored: 0, skipped: 0, failed: 0 };
}
