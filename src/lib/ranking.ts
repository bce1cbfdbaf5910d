/**
 * Reference-relative pose ranking
 *
 * For every reference ligand R and target T, each pose's deviation is its
 * score minus R's score on T. Per pose, the deviations across targets are
 * aggregated into one root-mean-square value: the substitutability score.
 * Lower means the pose behaves more like R.
 */

import type { ScoreEntry } from './ledgerExport';
import type { ScoreLedger } from './scoreLedger';
import type { WorkspacePaths } from './paths';
import { writeFileAtomic } from './fsUtils';

export interface DeviationRecord {
  reference: string;
  target: string;
  pose: string;
  /** score - referenceScore, sign preserved */
  deviation: number;
}

export interface SubstitutabilityScore {
  reference: string;
  pose: string;
  rms: number;
  /** Number of targets that contributed a deviation */
  targetCount: number;
}

export interface BestScore {
  pose: string;
  score: number;
  target: string;
}

export interface ClosestSubstitute {
  pose: string;
  rms: number;
  reference: string;
}

export interface RankingReport {
  references: string[];
  targets: string[];
  /** Candidate pose names in first-seen order (targets in catalog order) */
  poses: string[];
  referenceScores: Map<string, Map<string, number>>;
  /** reference -> target -> records sorted by |deviation| */
  deviations: Map<string, Map<string, DeviationRecord[]>>;
  /** reference -> scores sorted ascending by RMS */
  substitutability: Map<string, SubstitutabilityScore[]>;
  bestOverall: BestScore[];
  /** One row per pose in first-seen order: its lowest RMS over all references */
  closestSubstitutes: ClosestSubstitute[];
}

export interface RankingInput {
  references: string[];
  targets: string[];
  ledger: ScoreLedger;
}

export function formatMetric(value: number): string {
  return value.toFixed(4);
}

export function rootMeanSquare(values: number[]): number {
  if (values.length === 0) return Number.NaN;
  const meanSquare = values.reduce((sum, v) => sum + v * v, 0) / values.length;
  return Math.sqrt(meanSquare);
}

/** Closest to the reference first; the stored deviation keeps its sign */
export function sortByAbsoluteDeviation(records: DeviationRecord[]): DeviationRecord[] {
  return [...records].sort((a, b) => Math.abs(a.deviation) - Math.abs(b.deviation));
}

/**
 * Deviations of every candidate pose on one target, or null when the
 * reference itself has no score there.
 */
export function computeDeviations(
  reference: string,
  target: string,
  entries: ScoreEntry[],
  excluded: ReadonlySet<string>,
): DeviationRecord[] | null {
  const referenceEntry = entries.find((e) => e.name === reference);
  if (!referenceEntry) return null;

  const records = entries
    .filter((e) => e.name !== reference && !excluded.has(e.name))
    .map((e) => ({
      reference,
      target,
      pose: e.name,
      deviation: e.score - referenceEntry.score,
    }));

  return sortByAbsoluteDeviation(records);
}

export function aggregateSubstitutability(
  reference: string,
  deviationsByTarget: DeviationRecord[][],
): SubstitutabilityScore[] {
  const byPose = new Map<string, number[]>();
  for (const records of deviationsByTarget) {
    for (const record of records) {
      const list = byPose.get(record.pose);
      if (list) {
        list.push(record.deviation);
      } else {
        byPose.set(record.pose, [record.deviation]);
      }
    }
  }

  const scores = Array.from(byPose.entries()).map(([pose, deviations]) => ({
    reference,
    pose,
    rms: rootMeanSquare(deviations),
    targetCount: deviations.length,
  }));

  return scores.sort((a, b) => a.rms - b.rms);
}

export function computeBestOverall(
  entriesByTarget: Array<[string, ScoreEntry[]]>,
  excluded: ReadonlySet<string>,
): BestScore[] {
  const best = new Map<string, BestScore>();
  for (const [target, entries] of entriesByTarget) {
    for (const entry of entries) {
      if (excluded.has(entry.name)) continue;
      const current = best.get(entry.name);
      if (!current || entry.score < current.score) {
        best.set(entry.name, { pose: entry.name, score: entry.score, target });
      }
    }
  }
  return Array.from(best.values()).sort((a, b) => a.score - b.score);
}

export function buildRankingReport(input: RankingInput): RankingReport {
  const { references, targets, ledger } = input;
  const excluded = new Set(references);
  const entriesByTarget: Array<[string, ScoreEntry[]]> = targets.map((t) => [t, ledger.entries(t)]);

  const poses: string[] = [];
  const seen = new Set<string>();
  for (const [, entries] of entriesByTarget) {
    for (const entry of entries) {
      if (excluded.has(entry.name) || seen.has(entry.name)) continue;
      seen.add(entry.name);
      poses.push(entry.name);
    }
  }

  const referenceScores = new Map<string, Map<string, number>>();
  const deviations = new Map<string, Map<string, DeviationRecord[]>>();
  const substitutability = new Map<string, SubstitutabilityScore[]>();

  for (const reference of references) {
    const scores = new Map<string, number>();
    const perTarget = new Map<string, DeviationRecord[]>();

    for (const [target, entries] of entriesByTarget) {
      const records = computeDeviations(reference, target, entries, excluded);
      if (!records) continue;
      const refEntry = entries.find((e) => e.name === reference);
      if (refEntry) scores.set(target, refEntry.score);
      perTarget.set(target, records);
    }

    referenceScores.set(reference, scores);
    deviations.set(reference, perTarget);
    substitutability.set(reference, aggregateSubstitutability(reference, Array.from(perTarget.values())));
  }

  const closestByPose = new Map<string, ClosestSubstitute>();
  for (const reference of references) {
    for (const score of substitutability.get(reference) ?? []) {
      const closest = closestByPose.get(score.pose);
      if (!closest || score.rms < closest.rms) {
        closestByPose.set(score.pose, { pose: score.pose, rms: score.rms, reference });
      }
    }
  }
  const closestSubstitutes = poses.flatMap((pose) => closestByPose.get(pose) ?? []);

  return {
    references,
    targets,
    poses,
    referenceScores,
    deviations,
    substitutability,
    bestOverall: computeBestOverall(entriesByTarget, excluded),
    closestSubstitutes,
  };
}

// ---- Writers ----

function withHeader(header: string[], rows: string[]): string {
  return [...header, ...rows].join('\n') + '\n';
}

export function formatDeviationFile(reference: string, target: string, referenceScore: number, records: DeviationRecord[]): string {
  return withHeader(
    [`# Deviation from ${reference} (score ${referenceScore}) in ${target}`, '# Deviation  Name'],
    records.map((r) => `${formatMetric(r.deviation)} ${r.pose}`),
  );
}

export function formatRmsFile(reference: string, scores: SubstitutabilityScore[]): string {
  return withHeader(
    [`# Substitutability for ${reference}`, '# RMS  Name'],
    scores.map((s) => `${formatMetric(s.rms)} ${s.pose}`),
  );
}

export function formatClosestSubstitutes(rows: ClosestSubstitute[]): string {
  return withHeader(['# RMS  Name  Reference'], rows.map((r) => `${formatMetric(r.rms)} ${r.pose} ${r.reference}`));
}

export function formatBestOverall(rows: BestScore[]): string {
  return withHeader(['# Score  Name  Target'], rows.map((r) => `${r.score} ${r.pose} ${r.target}`));
}

export function writeRankingReport(report: RankingReport, paths: WorkspacePaths): void {
  for (const reference of report.references) {
    const perTarget = report.deviations.get(reference) ?? new Map<string, DeviationRecord[]>();
    const refScores = report.referenceScores.get(reference) ?? new Map<string, number>();

    for (const [target, records] of perTarget) {
      const refScore = refScores.get(target);
      if (refScore === undefined) continue;
      writeFileAtomic(paths.deviationFile(reference, target), formatDeviationFile(reference, target, refScore, records));
    }

    writeFileAtomic(paths.rmsFile(reference), formatRmsFile(reference, report.substitutability.get(reference) ?? []));
  }

  const ranked = [...report.closestSubstitutes].sort((a, b) => a.rms - b.rms);
  writeFileAtomic(paths.bestLigandsFile, formatClosestSubstitutes(report.closestSubstitutes));
  writeFileAtomic(paths.rankedBestLigandsFile, formatClosestSubstitutes(ranked));
  writeFileAtomic(paths.bestOverallFile, formatBestOverall(report.bestOverall));
}
