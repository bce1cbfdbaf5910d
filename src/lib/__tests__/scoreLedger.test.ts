import fs from 'node:fs';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createWorkspacePaths, type WorkspacePaths } from '../paths';
import { FileScoreLedger } from '../scoreLedger';
import { FailureLedger } from '../failureLedger';
import { makeTempRoot, removeTempRoot, writeFile } from './helpers';

describe('FileScoreLedger', () => {
  let root: string;
  let paths: WorkspacePaths;

  beforeEach(() => {
    root = makeTempRoot();
    paths = createWorkspacePaths(root);
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  it('creates the ledger with its header on first append', () => {
    new FileScoreLedger(paths).append('T1', 'L1', -7.2);
    expect(fs.readFileSync(paths.scoresFile('T1'), 'utf8')).toBe('# Score  Name\n-7.2 L1\n');
  });

  it('keeps rows sorted and ties in append order after every append', () => {
    const ledger = new FileScoreLedger(paths);
    ledger.append('T1', 'A', -6.5);
    ledger.append('T1', 'B', -8.0);
    ledger.append('T1', 'C', -6.5);
    ledger.append('T1', 'D', -7.0);
    ledger.append('T1', 'E', -6.5);

    expect(fs.readFileSync(paths.scoresFile('T1'), 'utf8')).toBe(
      '# Score  Name\n-8 B\n-7 D\n-6.5 A\n-6.5 C\n-6.5 E\n',
    );
    expect(ledger.entries('T1').map((e) => e.name)).toEqual(['B', 'D', 'A', 'C', 'E']);
  });

  it('regenerates the CSV mirror and statistics', () => {
    const ledger = new FileScoreLedger(paths);
    ledger.append('T1', 'A', -6);
    ledger.append('T1', 'B', -8);

    expect(fs.readFileSync(paths.scoresCsvFile('T1'), 'utf8')).toBe('rank,score,name\n1,-8,B\n2,-6,A\n');
    expect(fs.readFileSync(paths.scoresStatsFile('T1'), 'utf8')).toBe(
      '# Score statistics for T1\ncount 2\nmean -7.0000\nmedian -7.0000\nstd_dev 1.0000\nbest -8\nworst -6\n',
    );
  });

  it('matches names exactly', () => {
    const ledger = new FileScoreLedger(paths);
    ledger.append('T1', 'L1_model_10', -7);
    expect(ledger.has('T1', 'L1_model_10')).toBe(true);
    expect(ledger.has('T1', 'L1_model_1')).toBe(false);
    expect(ledger.has('T2', 'L1_model_10')).toBe(false);
  });

  it('reads an existing ledger written by an earlier run', () => {
    writeFile(paths.scoresFile('T1'), '# Score  Name\n-9.1 OLD\n');
    const ledger = new FileScoreLedger(paths);
    expect(ledger.find('T1', 'OLD')).toEqual({ score: -9.1, name: 'OLD' });

    ledger.append('T1', 'NEW', -9.5);
    expect(ledger.entries('T1')).toEqual([
      { score: -9.5, name: 'NEW' },
      { score: -9.1, name: 'OLD' },
    ]);
  });
});

describe('FailureLedger', () => {
  let root: string;
  let file: string;

  beforeEach(() => {
    root = makeTempRoot();
    file = createWorkspacePaths(root).failedTasksFile;
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  it('records each (name, target) pair once', () => {
    const failures = new FailureLedger(file);
    expect(failures.record({ name: 'L1', target: 'T1', reason: 'bad\n token' })).toBe(true);
    expect(failures.record({ name: 'L1', target: 'T1', reason: 'again' })).toBe(false);
    expect(failures.record({ name: 'L1', target: 'T2', reason: 'other' })).toBe(true);

    expect(fs.readFileSync(file, 'utf8')).toBe('# Name  Target  Reason\nL1 T1 bad token\nL1 T2 other\n');
  });

  it('reloads entries from disk', () => {
    new FailureLedger(file).record({ name: 'L1', target: 'T1', reason: 'timeout' });
    const reloaded = new FailureLedger(file);
    expect(reloaded.has('L1', 'T1')).toBe(true);
    expect(reloaded.list()).toEqual([{ name: 'L1', target: 'T1', reason: 'timeout' }]);
  });

  it('drops an entry once the pair is scored', () => {
    const failures = new FailureLedger(file);
    failures.record({ name: 'L1', target: 'T1', reason: 'x' });
    expect(failures.resolve('L1', 'T1')).toBe(true);
    expect(failures.size).toBe(0);
    expect(fs.readFileSync(file, 'utf8')).toBe('# Name  Target  Reason\n');
  });
});
