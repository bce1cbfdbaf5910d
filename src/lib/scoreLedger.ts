/**
 * Per-target score ledger.
 *
 * `append` is the only mutator. After each append the whole ledger is
 * re-materialized in sorted order together with its CSV mirror and
 * statistics summary. Components read through the ScoreLedger interface so a
 * buffered implementation can replace the file-backed one at larger scale.
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  LEDGER_HEADER,
  computeStatistics,
  exportStatistics,
  exportToCSV,
  formatScoreRow,
  parseScoreRows,
  sortEntries,
  type ScoreEntry,
} from './ledgerExport';
import { ensureDir, writeFileAtomic } from './fsUtils';
import type { WorkspacePaths } from './paths';

export interface ScoreLedger {
  append(target: string, name: string, score: number): void;
  has(target: string, name: string): boolean;
  /** Entries sorted ascending by score */
  entries(target: string): ScoreEntry[];
  find(target: string, name: string): ScoreEntry | undefined;
}

export class FileScoreLedger implements ScoreLedger {
  private readonly paths: WorkspacePaths;
  private readonly cache = new Map<string, ScoreEntry[]>();

  constructor(paths: WorkspacePaths) {
    this.paths = paths;
  }

  append(target: string, name: string, score: number): void {
    const ledgerFile = this.paths.scoresFile(target);
    ensureDir(path.dirname(ledgerFile));

    if (!fs.existsSync(ledgerFile)) {
      fs.writeFileSync(ledgerFile, `${LEDGER_HEADER}\n`, 'utf8');
    }
    fs.appendFileSync(ledgerFile, `${formatScoreRow({ score, name })}\n`, 'utf8');

    const sorted = sortEntries(parseScoreRows(fs.readFileSync(ledgerFile, 'utf8'), ledgerFile));
    const rows = sorted.map(formatScoreRow);
    writeFileAtomic(ledgerFile, [LEDGER_HEADER, ...rows].join('\n') + '\n');
    writeFileAtomic(this.paths.scoresCsvFile(target), exportToCSV(sorted));
    writeFileAtomic(this.paths.scoresStatsFile(target), exportStatistics(target, computeStatistics(sorted)));

    this.cache.set(target, sorted);
  }

  has(target: string, name: string): boolean {
    return this.find(target, name) !== undefined;
  }

  find(target: string, name: string): ScoreEntry | undefined {
    return this.entries(target).find((entry) => entry.name === name);
  }

  entries(target: string): ScoreEntry[] {
    const cached = this.cache.get(target);
    if (cached) return cached;

    const ledgerFile = this.paths.scoresFile(target);
    if (!fs.existsSync(ledgerFile)) return [];

    const entries = sortEntries(parseScoreRows(fs.readFileSync(ledgerFile, 'utf8'), ledgerFile));
    this.cache.set(target, entries);
    return entries;
  }
}
