/**
 * Result tree placement and per-pose summaries.
 *
 *   results/docked/<ligand>/<file>                              single pose
 *   results/docked/<ligand>/docked_<ligand>_model<k>/<file>     multi-pose
 *
 * A file never overwrites another: on collision the incoming file becomes
 * <stem>_copyN<ext> with the smallest unused N.
 */

import fs from 'node:fs';
import path from 'node:path';
import { ensureDir, writeFileAtomic } from './fsUtils';
import { decodePoseName, extensionOf, stemOf, type PoseName } from './naming';
import type { WorkspacePaths } from './paths';
import { formatMetric, type RankingReport } from './ranking';

/** Destination path inside dir that does not exist yet */
export function resolveCollision(dir: string, fileName: string): string {
  const candidate = path.join(dir, fileName);
  if (!fs.existsSync(candidate)) return candidate;

  const stem = stemOf(fileName);
  const ext = extensionOf(fileName);
  for (let n = 1; ; n++) {
    const copy = path.join(dir, `${stem}_copy${n}${ext}`);
    if (!fs.existsSync(copy)) return copy;
  }
}

function moveFile(source: string, destination: string): void {
  try {
    fs.renameSync(source, destination);
  } catch (err) {
    // rename can't cross devices; fall back to copy + unlink
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    fs.copyFileSync(source, destination);
    fs.unlinkSync(source);
  }
}

export function moveWithCollision(source: string, dir: string): string {
  ensureDir(dir);
  const destination = resolveCollision(dir, path.basename(source));
  moveFile(source, destination);
  return destination;
}

/** Move a finished task's artifacts into its pose directory */
export function placeArtifacts(paths: WorkspacePaths, pose: PoseName, files: string[]): string[] {
  const dir = paths.poseDir(pose);
  const placed: string[] = [];
  for (const file of files) {
    if (!fs.existsSync(file)) continue;
    placed.push(moveWithCollision(file, dir));
  }
  return placed;
}

// ---- Summaries ----

interface RankedValue {
  value: number;
  /** 1-based */
  rank: number;
  total: number;
}

/** pose -> rank lookups, built once per report */
export interface SummaryIndex {
  /** reference -> pose -> RMS */
  rms: Map<string, Map<string, RankedValue>>;
  /** reference -> target -> pose -> deviation */
  deviations: Map<string, Map<string, Map<string, RankedValue>>>;
}

function indexRows<T>(rows: T[], key: (row: T) => string, value: (row: T) => number): Map<string, RankedValue> {
  const index = new Map<string, RankedValue>();
  rows.forEach((row, i) => {
    index.set(key(row), { value: value(row), rank: i + 1, total: rows.length });
  });
  return index;
}

export function buildSummaryIndex(report: RankingReport): SummaryIndex {
  const rms = new Map<string, Map<string, RankedValue>>();
  const deviations = new Map<string, Map<string, Map<string, RankedValue>>>();

  for (const reference of report.references) {
    const scores = report.substitutability.get(reference) ?? [];
    rms.set(reference, indexRows(scores, (s) => s.pose, (s) => s.rms));

    const perTarget = new Map<string, Map<string, RankedValue>>();
    for (const [target, records] of report.deviations.get(reference) ?? []) {
      perTarget.set(target, indexRows(records, (r) => r.pose, (r) => r.deviation));
    }
    deviations.set(reference, perTarget);
  }

  return { rms, deviations };
}

/**
 * How one pose compares to every reference: its RMS and rank among the poses
 * ranked for that reference, then its signed deviation and rank per target.
 */
export function buildPoseSummary(
  report: RankingReport,
  poseName: string,
  index: SummaryIndex = buildSummaryIndex(report),
): string {
  const lines = [`# Summary for ${poseName}`];

  for (const reference of report.references) {
    const rms = index.rms.get(reference)?.get(poseName);
    lines.push('');
    lines.push(`Reference ${reference}`);
    if (!rms) {
      lines.push('  RMS: n/a');
      continue;
    }
    lines.push(`  RMS: ${formatMetric(rms.value)} (rank ${rms.rank}/${rms.total})`);

    const perTarget = index.deviations.get(reference);
    for (const target of report.targets) {
      const deviation = perTarget?.get(target)?.get(poseName);
      if (!deviation) continue;
      const sign = deviation.value > 0 ? '+' : '';
      lines.push(`  ${target}: ${sign}${formatMetric(deviation.value)} (rank ${deviation.rank}/${deviation.total})`);
    }
  }

  return lines.join('\n') + '\n';
}

export function writePoseSummaries(report: RankingReport, paths: WorkspacePaths): number {
  const index = buildSummaryIndex(report);
  for (const poseName of report.poses) {
    const content = buildPoseSummary(report, poseName, index);
    writeFileAtomic(paths.poseSummaryFile(decodePoseName(poseName), poseName), content);
  }
  return report.poses.length;
}
