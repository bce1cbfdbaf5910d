/**
 * Hit selection over ranked result files
 *
 * Any `<value> <name> [...]` file the run writes (ledgers, RMS rankings,
 * best-of lists) can be filtered by rank or by value range, intersected with
 * other filtered files, and have the docked structures of its hits collected.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { ensureDir } from './fsUtils';
import { STRUCTURE_EXTENSION, decodeTaskName, encodePoseName, stemOf } from './naming';

export interface RankedRow {
  value: number;
  name: string;
}

export type HitFilter =
  | { kind: 'top'; count: number }
  | { kind: 'range'; min: number; max: number };

export interface CollectResult {
  copied: string[];
  /** Names without any docked structure */
  missing: string[];
}

export function parseRankedRows(content: string): RankedRow[] {
  const rows: RankedRow[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const [valueToken, name] = trimmed.split(/\s+/);
    const value = Number(valueToken);
    if (!name || !Number.isFinite(value)) continue;
    rows.push({ value, name });
  }
  return rows;
}

export function selectHits(rows: RankedRow[], filter: HitFilter): RankedRow[] {
  if (filter.kind === 'top') {
    return rows.slice(0, filter.count);
  }
  return rows.filter((row) => row.value >= filter.min && row.value <= filter.max);
}

const topCountSchema = z.coerce.number().int().positive();
const boundSchema = z.coerce.number().finite();

export function topFilter(count: string | number): HitFilter {
  const parsed = topCountSchema.safeParse(count);
  if (!parsed.success) {
    throw new ConfigError(`Top count must be a positive integer, got '${count}'`);
  }
  return { kind: 'top', count: parsed.data };
}

export function rangeFilter(min: string | number, max: string | number): HitFilter {
  const lo = boundSchema.safeParse(min);
  const hi = boundSchema.safeParse(max);
  if (!lo.success || !hi.success) {
    throw new ConfigError(`Range bounds must be numbers, got '${min}' and '${max}'`);
  }
  if (lo.data > hi.data) {
    throw new ConfigError(`Range minimum ${lo.data} is greater than maximum ${hi.data}`);
  }
  return { kind: 'range', min: lo.data, max: hi.data };
}

/** `top=N` or `range=MIN,MAX` */
export function parseHitFilter(expression: string): HitFilter {
  const eq = expression.indexOf('=');
  const kind = eq < 0 ? expression : expression.slice(0, eq);
  const value = eq < 0 ? '' : expression.slice(eq + 1);

  if (kind === 'top') return topFilter(value);
  if (kind === 'range') {
    const parts = value.split(',');
    if (parts.length !== 2) {
      throw new ConfigError(`Range filter must look like range=MIN,MAX, got '${expression}'`);
    }
    return rangeFilter(parts[0], parts[1]);
  }
  throw new ConfigError(`Unknown filter '${expression}'; use top=N or range=MIN,MAX`);
}

/** `<file>:<filter>` as given on the command line */
export function parseFilteredFile(arg: string): { file: string; filter: HitFilter } {
  const colon = arg.lastIndexOf(':');
  if (colon <= 0) {
    throw new ConfigError(`Expected <file>:<filter>, got '${arg}'`);
  }
  return { file: arg.slice(0, colon), filter: parseHitFilter(arg.slice(colon + 1)) };
}

/** Names present in every list, in the order of the first */
export function intersectHits(lists: RankedRow[][]): string[] {
  if (lists.length === 0) return [];
  const [first, ...rest] = lists;
  const others = rest.map((rows) => new Set(rows.map((r) => r.name)));
  const seen = new Set<string>();
  const names: string[] = [];
  for (const row of first) {
    if (seen.has(row.name)) continue;
    seen.add(row.name);
    if (others.every((set) => set.has(row.name))) names.push(row.name);
  }
  return names;
}

export function describeFilter(filter: HitFilter): string {
  return filter.kind === 'top' ? `top ${filter.count}` : `range ${filter.min} to ${filter.max}`;
}

export function formatIntersection(names: string[], sources: Array<{ file: string; filter: HitFilter }>): string {
  const header = [
    `# ${names.length} names common to ${sources.length} files`,
    ...sources.map((s) => `#   ${path.basename(s.file)} (${describeFilter(s.filter)})`),
  ];
  return [...header, ...names].join('\n') + '\n';
}

export function readHits(file: string, filter: HitFilter): RankedRow[] {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`Ranked file not found: ${file}`);
  }
  return selectHits(parseRankedRows(fs.readFileSync(file, 'utf8')), filter);
}

/** Docked structure files under dir, as paths relative to it */
export function indexDockedStructures(dockedDir: string): string[] {
  if (!fs.existsSync(dockedDir)) return [];
  return fs
    .readdirSync(dockedDir, { recursive: true, encoding: 'utf8' })
    .filter((rel) => rel.endsWith(STRUCTURE_EXTENSION))
    .sort();
}

/**
 * Copy every docked structure of the named poses (`<name>_vs_<target>.pdbqt`
 * and its `_copyN` siblings) into outDir, optionally for one target only.
 */
export function collectHitStructures(
  names: string[],
  dockedDir: string,
  outDir: string,
  target?: string,
): CollectResult {
  const index = indexDockedStructures(dockedDir);
  ensureDir(outDir);
  const copied: string[] = [];
  const missing: string[] = [];

  for (const name of names) {
    const matches = index.filter((rel) => {
      const task = decodeTaskName(stemOf(rel).replace(/_copy\d+$/, ''));
      return task !== null && encodePoseName(task.pose) === name && (!target || task.target === target);
    });
    if (matches.length === 0) {
      missing.push(name);
      continue;
    }
    for (const rel of matches) {
      const destination = path.join(outDir, path.basename(rel));
      fs.copyFileSync(path.join(dockedDir, rel), destination);
      copied.push(destination);
    }
  }

  console.log(`[Rank] Copied ${copied.length} structures for ${names.length - missing.length}/${names.length} hits`);
  if (missing.length > 0) {
    console.warn(`[Rank] No docked structures for: ${missing.slice(0, 10).join(', ')}${missing.length > 10 ? ', ...' : ''}`);
  }

  return { copied, missing };
}
