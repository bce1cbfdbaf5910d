/**
 * Score Ledger Export Utilities
 *
 * Derived views regenerated after every ledger append:
 * - CSV mirror (one row per ledger entry)
 * - Statistics summary (count, mean, median, standard deviation)
 */

export interface ScoreEntry {
  score: number;
  name: string;
}

export interface ScoreStatistics {
  count: number;
  mean: number;
  median: number;
  /** Population standard deviation */
  stdDev: number;
  best: number;
  worst: number;
}

export const LEDGER_HEADER = '# Score  Name';

export function formatScoreRow(entry: ScoreEntry): string {
  return `${entry.score} ${entry.name}`;
}

/**
 * Parse ledger rows: `<score> <name>`, header and comment lines skipped.
 * Rows whose first token isn't a number are dropped with a warning.
 */
export function parseScoreRows(content: string, source = 'ledger'): ScoreEntry[] {
  const entries: ScoreEntry[] = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const match = trimmed.match(/^(\S+)\s+(.+)$/);
    const score = match ? Number(match[1]) : Number.NaN;
    if (!match || !Number.isFinite(score)) {
      console.warn(`[Ledger] Skipping malformed row in ${source}: '${trimmed}'`);
      continue;
    }
    entries.push({ score, name: match[2] });
  }

  return entries;
}

/** Stable ascending sort by score; equal scores keep their current order */
export function sortEntries(entries: ScoreEntry[]): ScoreEntry[] {
  return [...entries].sort((a, b) => a.score - b.score);
}

export function computeStatistics(entries: ScoreEntry[]): ScoreStatistics | null {
  if (entries.length === 0) return null;

  const scores = entries.map((e) => e.score).sort((a, b) => a - b);
  const count = scores.length;
  const mean = scores.reduce((sum, s) => sum + s, 0) / count;
  const mid = Math.floor(count / 2);
  const median = count % 2 === 0 ? (scores[mid - 1] + scores[mid]) / 2 : scores[mid];
  const variance = scores.reduce((sum, s) => sum + (s - mean) ** 2, 0) / count;

  return {
    count,
    mean,
    median,
    stdDev: Math.sqrt(variance),
    best: scores[0],
    worst: scores[count - 1],
  };
}

export function exportStatistics(target: string, stats: ScoreStatistics | null): string {
  const lines = [`# Score statistics for ${target}`];
  if (!stats) {
    lines.push('count 0');
  } else {
    lines.push(
      `count ${stats.count}`,
      `mean ${stats.mean.toFixed(4)}`,
      `median ${stats.median.toFixed(4)}`,
      `std_dev ${stats.stdDev.toFixed(4)}`,
      `best ${stats.best}`,
      `worst ${stats.worst}`,
    );
  }
  return lines.join('\n') + '\n';
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Export entries as CSV
 *
 * Headers: rank,score,name
 */
export function exportToCSV(entries: ScoreEntry[]): string {
  const rows: string[] = ['rank,score,name'];

  entries.forEach((entry, idx) => {
    rows.push([String(idx + 1), String(entry.score), escapeCsvField(entry.name)].join(','));
  });

  return rows.join('\n') + '\n';
}
