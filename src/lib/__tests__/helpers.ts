/**
 * Shared fixtures: temporary workspaces, structure files, and in-process
 * stand-ins for the scoring tool and the pose splitter.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { RunConfig } from '../config';
import { stemOf } from '../naming';
import type { LaunchOptions, LaunchedProcess, ProcessExit, ProcessLauncher } from '../processes';

export function makeTempRoot(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'pose-rank-'));
}

export function removeTempRoot(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export function writeFile(filePath: string, content: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf8');
  return filePath;
}

/** One ATOM record with x/y/z in columns 31-54 */
export function atomLine(serial: number, x: number, y: number, z: number): string {
  const coord = (v: number) => v.toFixed(3).padStart(8);
  return `ATOM  ${String(serial).padStart(5)} N    ALA A   1    ${coord(x)}${coord(y)}${coord(z)}  1.00  0.00     0.000 N`;
}

export function targetContent(coords: Array<[number, number, number]>): string {
  return ['REMARK test receptor', ...coords.map(([x, y, z], i) => atomLine(i + 1, x, y, z)), 'END'].join('\n') + '\n';
}

export function singlePoseContent(): string {
  return ['REMARK single pose', 'ROOT', 'HETATM    1  C   UNL     1       0.000   0.000   0.000  0.00  0.00    +0.000 C', 'ENDROOT', 'TORSDOF 0'].join('\n') + '\n';
}

export function multiPoseContent(count: number): string {
  const lines: string[] = [];
  for (let k = 1; k <= count; k++) {
    lines.push(`MODEL ${k}`, 'ROOT', 'ENDROOT', 'TORSDOF 0', 'ENDMDL');
  }
  return lines.join('\n') + '\n';
}

/** A scoring tool log whose first result row carries `token` */
export function toolLog(token: string, markers = 51): string {
  return [
    'AutoDock Vina (test build)',
    'Performing search ...',
    '0%   10   20   30   40   50   60   70   80   90   100%',
    '|----|----|----|----|----|----|----|----|----|----|',
    '*'.repeat(markers),
    'done.',
    'mode |   affinity | dist from best mode',
    '     | (kcal/mol) | rmsd l.b.| rmsd u.b.',
    '-----+------------+----------+----------',
    `   1       ${token}      0.000      0.000`,
    '   2       -1.1      1.204      2.310',
  ].join('\n') + '\n';
}

export function testConfig(root: string, overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    root,
    scoringTool: 'vina',
    splitter: 'vina_split',
    pollIntervalMs: 5,
    toolTimeoutMs: 0,
    killGraceMs: 20,
    debug: false,
    toolParams: {},
    ...overrides,
  };
}

// ---- Fake launchers ----

export interface FakeCall {
  command: string;
  args: string[];
  options: LaunchOptions;
}

export interface FakeRunResult {
  /** Written to options.logFile; omit to leave no log behind */
  log?: string;
  exitCode?: number;
  /** Never exits on its own; resolves when killed */
  hang?: boolean;
  /** With hang: SIGTERM is ignored, only SIGKILL ends it */
  ignoreTerm?: boolean;
}

export type FakeBehavior = (call: FakeCall) => FakeRunResult;

export interface FakeLauncher extends ProcessLauncher {
  calls: FakeCall[];
  killed: string[];
  signals: NodeJS.Signals[];
}

export function argValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

export function createFakeLauncher(behavior: FakeBehavior): FakeLauncher {
  const calls: FakeCall[] = [];
  const killed: string[] = [];
  const signals: NodeJS.Signals[] = [];

  return {
    calls,
    killed,
    signals,
    launch(command, args, options = {}): LaunchedProcess {
      const call = { command, args, options };
      calls.push(call);
      const result = behavior(call);

      if (options.logFile && result.log !== undefined) {
        writeFile(options.logFile, result.log);
      }
      const out = argValue(args, '--out');
      if (out && result.exitCode === undefined && !result.hang) {
        writeFile(out, 'MODEL 1\nENDMDL\n');
      }

      let resolveExit: (exit: ProcessExit) => void = () => undefined;
      const exited = new Promise<ProcessExit>((resolve) => {
        resolveExit = resolve;
      });
      if (!result.hang) {
        resolveExit({ code: result.exitCode ?? 0, signal: null });
      }

      return {
        exited,
        kill(signal = 'SIGTERM') {
          signals.push(signal);
          if (result.ignoreTerm && signal === 'SIGTERM') return;
          killed.push(command);
          resolveExit({ code: null, signal });
        },
      };
    },
  };
}

/**
 * Scoring tool stand-in: looks up `<ligand stem>|<receptor stem>` in the
 * table; missing pairs produce a log without a numeric score.
 */
export function scoringBehavior(scores: Record<string, string>): FakeBehavior {
  return ({ args }) => {
    const ligand = stemOf(argValue(args, '--ligand') ?? '');
    const receptor = stemOf(argValue(args, '--receptor') ?? '');
    const token = scores[`${ligand}|${receptor}`] ?? 'n/a';
    return { log: toolLog(token) };
  };
}

/** Splitter stand-in: writes <prefix><k>.pdbqt for every MODEL in the input */
export function splitterBehavior(): FakeBehavior {
  return ({ args }) => {
    const input = argValue(args, '--input') ?? '';
    const prefix = argValue(args, '--ligand') ?? '';
    const models = (fs.readFileSync(input, 'utf8').match(/^MODEL\b/gm) ?? []).length;
    for (let k = 1; k <= models; k++) {
      writeFile(`${prefix}${k}.pdbqt`, `MODEL ${k}\nENDMDL\n`);
    }
    return {};
  };
}

/** Route splitter calls and scoring calls to their own behaviors */
export function combinedBehavior(scoring: FakeBehavior, splitter: FakeBehavior = splitterBehavior()): FakeBehavior {
  return (call) => (call.command === 'vina_split' ? splitter(call) : scoring(call));
}
