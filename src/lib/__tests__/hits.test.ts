import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ConfigError } from '../errors';
import {
  collectHitStructures,
  formatIntersection,
  intersectHits,
  parseFilteredFile,
  parseHitFilter,
  parseRankedRows,
  rangeFilter,
  readHits,
  selectHits,
  topFilter,
} from '../hits';
import { makeTempRoot, removeTempRoot, writeFile } from './helpers';

const LEDGER = '# Score  Name\n-9 A\n-7.2 B\nbad row\n-6.1 C\n';

describe('ranked rows', () => {
  it('skips headers and rows without a numeric value', () => {
    expect(parseRankedRows(LEDGER)).toEqual([
      { value: -9, name: 'A' },
      { value: -7.2, name: 'B' },
      { value: -6.1, name: 'C' },
    ]);
  });

  it('selects by rank or by inclusive range', () => {
    const rows = parseRankedRows(LEDGER);
    expect(selectHits(rows, { kind: 'top', count: 2 }).map((r) => r.name)).toEqual(['A', 'B']);
    expect(selectHits(rows, { kind: 'range', min: -7.2, max: -6 }).map((r) => r.name)).toEqual(['B', 'C']);
  });
});

describe('filters', () => {
  it('validates the top count', () => {
    expect(topFilter('3')).toEqual({ kind: 'top', count: 3 });
    expect(() => topFilter('0')).toThrow(ConfigError);
    expect(() => topFilter('abc')).toThrow("Top count must be a positive integer, got 'abc'");
  });

  it('rejects an inverted range', () => {
    expect(() => rangeFilter('-5', '-9')).toThrow('Range minimum -5 is greater than maximum -9');
  });

  it('parses filter expressions', () => {
    expect(parseHitFilter('top=5')).toEqual({ kind: 'top', count: 5 });
    expect(parseHitFilter('range=-9,-7')).toEqual({ kind: 'range', min: -9, max: -7 });
    expect(() => parseHitFilter('range=-9')).toThrow(ConfigError);
    expect(() => parseHitFilter('best=3')).toThrow("Unknown filter 'best=3'; use top=N or range=MIN,MAX");
  });

  it('splits the filter off at the last colon', () => {
    expect(parseFilteredFile('runs/a:b/scores_T1.txt:top=3')).toEqual({
      file: 'runs/a:b/scores_T1.txt',
      filter: { kind: 'top', count: 3 },
    });
    expect(() => parseFilteredFile('scores_T1.txt')).toThrow(ConfigError);
  });
});

describe('intersection', () => {
  it('keeps names present in every list, in the order of the first', () => {
    const first = [
      { value: 0.1, name: 'C' },
      { value: 0.2, name: 'A' },
      { value: 0.3, name: 'B' },
    ];
    const second = [
      { value: -9, name: 'A' },
      { value: -8, name: 'C' },
    ];
    expect(intersectHits([first, second])).toEqual(['C', 'A']);
    expect(intersectHits([])).toEqual([]);
  });

  it('lists the filtered sources in the header', () => {
    const content = formatIntersection(
      ['A'],
      [
        { file: '/x/scores_T1.txt', filter: { kind: 'top', count: 2 } },
        { file: '/x/scores_R1_RMS.txt', filter: { kind: 'range', min: -1, max: 1 } },
      ],
    );
    expect(content).toBe(
      '# 1 names common to 2 files\n#   scores_T1.txt (top 2)\n#   scores_R1_RMS.txt (range -1 to 1)\nA\n',
    );
  });
});

describe('hit files', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempRoot();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempRoot(root);
  });

  it('reads and filters a ranked file', () => {
    const file = writeFile(path.join(root, 'scores_T1.txt'), LEDGER);
    expect(readHits(file, { kind: 'top', count: 1 })).toEqual([{ value: -9, name: 'A' }]);
    expect(() => readHits(path.join(root, 'missing.txt'), { kind: 'top', count: 1 })).toThrow(ConfigError);
  });

  it('collects the docked structures of each hit for one target', () => {
    const docked = path.join(root, 'docked');
    const modelDir = path.join(docked, 'L1', 'docked_L1_model1');
    writeFile(path.join(modelDir, 'L1_model_1_vs_T1.pdbqt'), 'first\n');
    writeFile(path.join(modelDir, 'L1_model_1_vs_T1_copy1.pdbqt'), 'second\n');
    writeFile(path.join(modelDir, 'L1_model_1_vs_T2.pdbqt'), 'other target\n');
    writeFile(path.join(modelDir, 'L1_model_1_vs_T1.log'), 'log\n');
    writeFile(path.join(docked, 'L10', 'L10_vs_T1.pdbqt'), 'single\n');
    const out = path.join(root, 'hits');

    const result = collectHitStructures(['L1_model_1', 'L10', 'Z'], docked, out, 'T1');

    expect(result.missing).toEqual(['Z']);
    expect(result.copied).toHaveLength(3);
    expect(fs.readdirSync(out).sort()).toEqual([
      'L10_vs_T1.pdbqt',
      'L1_model_1_vs_T1.pdbqt',
      'L1_model_1_vs_T1_copy1.pdbqt',
    ]);
    expect(fs.readFileSync(path.join(out, 'L1_model_1_vs_T1_copy1.pdbqt'), 'utf8')).toBe('second\n');
  });

  it('does not match a pose by its name prefix', () => {
    const docked = path.join(root, 'docked');
    writeFile(path.join(docked, 'L10', 'L10_vs_T1.pdbqt'), 'single\n');

    const result = collectHitStructures(['L1'], docked, path.join(root, 'hits'));

    expect(result).toEqual({ copied: [], missing: ['L1'] });
  });
});
