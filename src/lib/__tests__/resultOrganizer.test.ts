import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createWorkspacePaths, type WorkspacePaths } from '../paths';
import { moveWithCollision, placeArtifacts, resolveCollision } from '../resultOrganizer';
import { makeTempRoot, removeTempRoot, writeFile } from './helpers';

describe('result organizer', () => {
  let root: string;
  let paths: WorkspacePaths;

  beforeEach(() => {
    root = makeTempRoot();
    paths = createWorkspacePaths(root);
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  it('keeps the name when free, then appends _copyN', () => {
    const dest = path.join(root, 'dest');
    const first = moveWithCollision(writeFile(path.join(root, 'a', 'L1_vs_T1.log'), 'first'), dest);
    const second = moveWithCollision(writeFile(path.join(root, 'b', 'L1_vs_T1.log'), 'second'), dest);
    const third = moveWithCollision(writeFile(path.join(root, 'c', 'L1_vs_T1.log'), 'third'), dest);

    expect(path.basename(first)).toBe('L1_vs_T1.log');
    expect(path.basename(second)).toBe('L1_vs_T1_copy1.log');
    expect(path.basename(third)).toBe('L1_vs_T1_copy2.log');
    expect(fs.readFileSync(first, 'utf8')).toBe('first');
    expect(fs.readFileSync(second, 'utf8')).toBe('second');
  });

  it('takes the smallest unused copy number', () => {
    const dest = path.join(root, 'dest');
    writeFile(path.join(dest, 'x.pdbqt'), '');
    writeFile(path.join(dest, 'x_copy2.pdbqt'), '');
    expect(resolveCollision(dest, 'x.pdbqt')).toBe(path.join(dest, 'x_copy1.pdbqt'));
  });

  it('nests multi-pose artifacts under the model directory', () => {
    const log = writeFile(path.join(paths.tempDir, 'L1_model_3_vs_T1.log'), 'log');
    const out = writeFile(path.join(paths.tempDir, 'L1_model_3_vs_T1.pdbqt'), 'out');

    const placed = placeArtifacts(paths, { ligand: 'L1', model: 3 }, [log, out]);

    const dir = path.join(paths.dockedDir, 'L1', 'docked_L1_model3');
    expect(placed).toEqual([path.join(dir, 'L1_model_3_vs_T1.log'), path.join(dir, 'L1_model_3_vs_T1.pdbqt')]);
    expect(fs.existsSync(log)).toBe(false);
  });

  it('places single-pose artifacts directly under the ligand and skips missing files', () => {
    const log = writeFile(path.join(paths.tempDir, 'SOLO_vs_T1.log'), 'log');
    const placed = placeArtifacts(paths, { ligand: 'SOLO' }, [log, path.join(paths.tempDir, 'SOLO_vs_T1.pdbqt')]);
    expect(placed).toEqual([path.join(paths.dockedDir, 'SOLO', 'SOLO_vs_T1.log')]);
  });
});
