/**
 * Terminal progress display driven by the session store.
 *
 * Redraws a full frame on every state change. In debug mode the terminal is
 * never cleared (tool output and logs stay readable) and one line is printed
 * per finished task instead.
 */

import type { SessionState, SessionStore } from './session';
import { selectRemainingMs, selectTaskCounter } from './session';

const CLEAR_SCREEN = '\x1b[H\x1b[J';
const RULE = '========================================';

const PHASE_TITLES: Record<NonNullable<SessionState['phase']>, string> = {
  'reference-scoring': 'Reference scoring',
  'pose-scoring': 'Pose scoring',
  'ranking': 'Ranking',
};

export function renderProgressBar(current: number, total: number, width = 40): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, current / total)) : 0;
  const filled = Math.round(ratio * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${Math.round(ratio * 100)}%`;
}

/** HH:MM:SS */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, '0')).join(':');
}

function level(label: string, index: number, total: number, width: number): string[] {
  const shown = Math.min(index + 1, total);
  return [`${label} ${shown}/${total}`, renderProgressBar(shown, total, width)];
}

export function renderFrame(state: SessionState, width = 40): string {
  const lines = [RULE, '           Batch Docking Run', RULE, ''];
  const { cursors, totals } = state;

  lines.push(`Phase: ${state.phase ? PHASE_TITLES[state.phase] : 'starting'}`, '');

  if (state.phase === 'reference-scoring') {
    lines.push(...level('Reference ligand', cursors.referenceLigand, totals.referenceLigand, width));
    lines.push(...level('Target', cursors.referenceTarget, totals.referenceTarget, width));
  } else if (state.phase === 'pose-scoring') {
    lines.push(...level('Ligand file', cursors.ligand, totals.ligand, width));
    lines.push(...level('Ligand pose', cursors.pose, totals.pose, width));
    lines.push(...level('Target', cursors.target, totals.target, width));
  }

  if (state.currentTask) {
    lines.push('', `Current: ${state.currentTask.name} vs ${state.currentTask.target}`);
    lines.push(renderProgressBar(state.taskProgress, 100, width));
  }

  const counter = selectTaskCounter(state);
  if (counter.total > 0) {
    const current = Math.min(counter.current, counter.total);
    lines.push('', `Total progress: ${current}/${counter.total}`);
    lines.push(renderProgressBar(current, counter.total, width));
  }

  const remaining = selectRemainingMs(state);
  lines.push('', `Estimated time to completion: ${remaining === null ? '--:--:--' : formatDuration(remaining)}`);
  lines.push(
    `Scored ${state.counts.scored}, skipped ${state.counts.skipped}, failed ${state.counts.failed}`,
    '',
    'Press Ctrl+C to stop; progress is saved',
  );

  return lines.join('\n') + '\n';
}

export interface ProgressDisplayOptions {
  debug: boolean;
  write?: (text: string) => void;
}

/** Subscribe a renderer to the store; returns the unsubscribe function */
export function attachProgressDisplay(store: SessionStore, options: ProgressDisplayOptions): () => void {
  const write = options.write ?? ((text: string) => process.stdout.write(text));

  if (options.debug) {
    return store.subscribe((state, prev) => {
      const outcome = state.lastOutcome;
      if (!outcome || outcome === prev.lastOutcome) return;
      const { current, total } = selectTaskCounter(prev);
      const detail = outcome.status === 'scored' ? ` ${outcome.score}` : outcome.status === 'failed' ? ` (${outcome.reason})` : '';
      write(`[Session] ${current}/${total} ${outcome.name} vs ${outcome.target}: ${outcome.status}${detail}\n`);
    });
  }

  const columns = process.stdout.columns ?? 80;
  const width = Math.max(10, columns - 30);
  return store.subscribe((state) => {
    write(CLEAR_SCREEN + renderFrame(state, width));
  });
}
