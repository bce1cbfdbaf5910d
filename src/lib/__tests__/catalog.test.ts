import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { clearCache, clearEverything, listStructureFiles, loadCatalog } from '../catalog';
import { FatalInputError } from '../errors';
import { createWorkspacePaths, type WorkspacePaths } from '../paths';
import { makeTempRoot, removeTempRoot, singlePoseContent, targetContent, writeFile } from './helpers';

describe('input catalog', () => {
  let root: string;
  let paths: WorkspacePaths;

  beforeEach(() => {
    root = makeTempRoot();
    paths = createWorkspacePaths(root);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempRoot(root);
  });

  const populate = () => {
    writeFile(path.join(paths.inputDir('candidates'), 'L2.pdbqt'), singlePoseContent());
    writeFile(path.join(paths.inputDir('candidates'), 'L1.pdbqt'), singlePoseContent());
    writeFile(path.join(paths.inputDir('candidates'), 'notes.txt'), 'ignored');
    writeFile(path.join(paths.inputDir('targets'), 'T1.pdbqt'), targetContent([[0, 0, 0]]));
    writeFile(path.join(paths.inputDir('references'), 'R1.pdbqt'), singlePoseContent());
  };

  it('lists structure files sorted by name', () => {
    populate();
    expect(listStructureFiles(paths.inputDir('candidates'))).toEqual([
      { name: 'L1', file: path.join(paths.inputDir('candidates'), 'L1.pdbqt') },
      { name: 'L2', file: path.join(paths.inputDir('candidates'), 'L2.pdbqt') },
    ]);
  });

  it('writes the enumerated names to the cache', () => {
    populate();
    const catalog = loadCatalog(paths);
    expect(catalog.targets.map((t) => t.name)).toEqual(['T1']);
    expect(fs.readFileSync(paths.nameListFile('candidates'), 'utf8')).toBe('L1\nL2\n');
    expect(fs.readFileSync(paths.nameListFile('references'), 'utf8')).toBe('R1\n');
  });

  it('fails fast when an input set is empty', () => {
    populate();
    fs.rmSync(paths.inputDir('references'), { recursive: true });
    expect(() => loadCatalog(paths)).toThrow(FatalInputError);
    expect(() => loadCatalog(paths)).toThrow(`No .pdbqt files found in ${paths.inputDir('references')}`);
  });

  it('rejects ligand names that read as split models', () => {
    populate();
    writeFile(path.join(paths.inputDir('candidates'), 'L1_model_2.pdbqt'), singlePoseContent());
    expect(() => loadCatalog(paths)).toThrow(
      `Input names must not end in _model_<number>: L1_model_2 in ${paths.inputDir('candidates')}`,
    );
  });

  it('backs up the cache without overwriting earlier backups', () => {
    writeFile(paths.checkpointFile, 'LIGAND_INDEX=3\n');
    writeFile(path.join(paths.modelsDir('L1'), 'L1_model_1.pdbqt'), 'MODEL 1\n');
    writeFile(path.join(paths.cacheBackupDir, 'progress_cache.txt'), 'older\n');

    expect(clearCache(paths)).toBe(2);

    expect(fs.readdirSync(paths.cacheDir)).toEqual(['cache_backup']);
    expect(fs.readFileSync(path.join(paths.cacheBackupDir, 'progress_cache.txt'), 'utf8')).toBe('older\n');
    expect(fs.readFileSync(path.join(paths.cacheBackupDir, 'progress_cache_copy1.txt'), 'utf8')).toBe('LIGAND_INDEX=3\n');
    expect(fs.existsSync(path.join(paths.cacheBackupDir, 'models_L1', 'L1_model_1.pdbqt'))).toBe(true);
  });

  it('deletes cache and results', () => {
    writeFile(paths.checkpointFile, 'LIGAND_INDEX=3\n');
    writeFile(paths.scoresFile('T1'), '# Score  Name\n');
    clearEverything(paths);
    expect(fs.existsSync(paths.cacheDir)).toBe(false);
    expect(fs.existsSync(paths.resultsDir)).toBe(false);
  });
});
