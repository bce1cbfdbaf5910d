/**
 * Input Catalog
 *
 * Enumerates the candidate, target and reference structure files once at
 * startup. Lists are sorted by name so iteration order (and therefore the
 * checkpoint cursors) is stable across runs.
 */

import fs from 'node:fs';
import path from 'node:path';
import { FatalInputError } from './errors';
import { ensureDir, writeFileAtomic } from './fsUtils';
import { STRUCTURE_EXTENSION, decodePoseName, stemOf } from './naming';
import type { InputKind, WorkspacePaths } from './paths';
import { moveWithCollision } from './resultOrganizer';

export interface CatalogEntry {
  /** File stem, used as the identifier everywhere else */
  name: string;
  file: string;
}

export interface InputCatalog {
  candidates: CatalogEntry[];
  targets: CatalogEntry[];
  references: CatalogEntry[];
}

const INPUT_KINDS: readonly InputKind[] = ['candidates', 'targets', 'references'];

export function listStructureFiles(dir: string): CatalogEntry[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((fileName) => fileName.endsWith(STRUCTURE_EXTENSION))
    .sort()
    .map((fileName) => ({ name: stemOf(fileName), file: path.join(dir, fileName) }));
}

function loadInputs(paths: WorkspacePaths, kind: InputKind): CatalogEntry[] {
  const dir = paths.inputDir(kind);
  const entries = listStructureFiles(dir);
  if (entries.length === 0) {
    throw new FatalInputError(`No ${STRUCTURE_EXTENSION} files found in ${dir}`);
  }
  // Such a stem would read back as a split model of another ligand
  const clashing = entries.filter((e) => decodePoseName(e.name).model !== undefined);
  if (kind !== 'targets' && clashing.length > 0) {
    throw new FatalInputError(
      `Input names must not end in _model_<number>: ${clashing.map((e) => e.name).join(', ')} in ${dir}`,
    );
  }
  return entries;
}

export function loadCatalog(paths: WorkspacePaths): InputCatalog {
  const catalog: InputCatalog = {
    candidates: loadInputs(paths, 'candidates'),
    targets: loadInputs(paths, 'targets'),
    references: loadInputs(paths, 'references'),
  };

  ensureDir(paths.cacheDir);
  for (const kind of INPUT_KINDS) {
    writeFileAtomic(paths.nameListFile(kind), catalog[kind].map((e) => e.name).join('\n') + '\n');
  }

  console.log(
    `[Session] Catalog: ${catalog.candidates.length} candidates, ${catalog.targets.length} targets, ` +
      `${catalog.references.length} references`,
  );

  return catalog;
}

/** Move every cache entry into cache/cache_backup/, keeping older backups */
export function clearCache(paths: WorkspacePaths): number {
  if (!fs.existsSync(paths.cacheDir)) return 0;

  const backupName = path.basename(paths.cacheBackupDir);
  let moved = 0;
  for (const entry of fs.readdirSync(paths.cacheDir)) {
    if (entry === backupName) continue;
    moveWithCollision(path.join(paths.cacheDir, entry), paths.cacheBackupDir);
    moved++;
  }

  console.log(`[Session] Cache cleared; ${moved} entries moved to ${paths.cacheBackupDir}`);
  return moved;
}

export function clearEverything(paths: WorkspacePaths): void {
  fs.rmSync(paths.cacheDir, { recursive: true, force: true });
  fs.rmSync(paths.resultsDir, { recursive: true, force: true });
  console.log('[Session] Cache and results deleted');
}
