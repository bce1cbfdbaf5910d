/**
 * Scoring tool contract: argument building, log polling and score extraction.
 */

import fs from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import { boxToArgs, type DockingBox } from './dockingBox';
import type { ToolParams } from './config';
import { ScoreParseError, checkAborted } from './errors';
import type { ProcessExit } from './processes';

/** Optionally signed decimal with at most one decimal point */
const SCORE_TOKEN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/** First ranked result row: leading whitespace, then mode number 1 */
const FIRST_RESULT_LINE = /^\s+1\s+(\S+)/;

/** Each search progress marker is worth 2% */
const PERCENT_PER_MARKER = 2;

export function isValidScoreToken(token: string): boolean {
  return SCORE_TOKEN.test(token);
}

export function parseScoreFromLog(content: string, logFile = 'log'): number {
  for (const line of content.split(/\r?\n/)) {
    const match = line.match(FIRST_RESULT_LINE);
    if (!match) continue;

    const token = match[1];
    if (!isValidScoreToken(token)) {
      throw new ScoreParseError(logFile, `Score token '${token}' in ${logFile} is not a number`);
    }
    return Number(token);
  }
  throw new ScoreParseError(logFile, `No result line found in ${logFile}`);
}

export function countProgress(content: string): number {
  let markers = 0;
  for (const ch of content) {
    if (ch === '*') markers++;
  }
  return Math.min(100, markers * PERCENT_PER_MARKER);
}

export interface ToolInvocation {
  receptor: string;
  ligand: string;
  box: DockingBox;
  out: string;
  params: ToolParams;
}

export function buildToolArgs(invocation: ToolInvocation): string[] {
  const { receptor, ligand, box, out, params } = invocation;
  const args = ['--receptor', receptor, '--ligand', ligand, ...boxToArgs(box), '--out', out];

  if (params.cpu !== undefined) args.push('--cpu', String(params.cpu));
  if (params.exhaustiveness !== undefined) args.push('--exhaustiveness', String(params.exhaustiveness));
  if (params.energyRange !== undefined) args.push('--energy_range', String(params.energyRange));
  if (params.numModes !== undefined) args.push('--num_modes', String(params.numModes));

  return args;
}

// ---- Log monitor ----

export interface MonitorOptions {
  logFile: string;
  exited: Promise<ProcessExit>;
  pollIntervalMs: number;
  /** 0 disables the timeout */
  timeoutMs: number;
  signal: AbortSignal;
  onProgress?: (percent: number) => void;
}

export type MonitorResult =
  | { status: 'exited'; exit: ProcessExit }
  | { status: 'timeout'; elapsedMs: number };

function readProgress(logFile: string): number {
  if (!fs.existsSync(logFile)) return 0;
  return countProgress(fs.readFileSync(logFile, 'utf8'));
}

/**
 * Poll the tool's log until the process exits, the timeout expires or the
 * signal aborts. Progress is advisory; the exit is what ends the task.
 */
export async function monitorLog(options: MonitorOptions): Promise<MonitorResult> {
  const { logFile, pollIntervalMs, timeoutMs, signal, onProgress } = options;
  const startTime = Date.now();
  const exited = options.exited.then((exit) => ({ status: 'exited' as const, exit }));
  let lastPercent = -1;

  const report = () => {
    const percent = readProgress(logFile);
    if (percent !== lastPercent) {
      lastPercent = percent;
      onProgress?.(percent);
    }
  };

  while (true) {
    checkAborted(signal);

    const elapsedMs = Date.now() - startTime;
    if (timeoutMs > 0 && elapsedMs >= timeoutMs) {
      return { status: 'timeout', elapsedMs };
    }

    report();

    const result = await Promise.race([
      exited,
      sleep(pollIntervalMs, null, { signal }),
    ]);

    if (result) {
      report();
      return result;
    }
  }
}
