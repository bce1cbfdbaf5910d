/**
 * Canonical on-disk layout, relative to a working root.
 */

import path from 'node:path';
import { LOG_EXTENSION, STRUCTURE_EXTENSION, modelDirectoryName, type PoseName } from './naming';

export type InputKind = 'candidates' | 'targets' | 'references';

const INPUT_DIRECTORIES: Record<InputKind, string> = {
  candidates: 'candidates',
  targets: 'targets',
  references: 'reference_ligands',
};

const NAME_LIST_FILES: Record<InputKind, string> = {
  candidates: 'candidate_names.txt',
  targets: 'target_names.txt',
  references: 'reference_names.txt',
};

export interface WorkspacePaths {
  root: string;
  configDir: string;
  cacheDir: string;
  cacheBackupDir: string;
  resultsDir: string;
  tempDir: string;
  scoresDir: string;
  dockedDir: string;
  checkpointFile: string;
  failedTasksFile: string;
  bestLigandsFile: string;
  rankedBestLigandsFile: string;
  bestOverallFile: string;
  inputDir: (kind: InputKind) => string;
  nameListFile: (kind: InputKind) => string;
  targetConfigFile: (target: string) => string;
  modelsDir: (ligand: string) => string;
  scoresFile: (target: string) => string;
  scoresCsvFile: (target: string) => string;
  scoresStatsFile: (target: string) => string;
  rmsFile: (reference: string) => string;
  deviationFile: (reference: string, target: string) => string;
  tempArtifact: (taskName: string, kind: 'log' | 'structure') => string;
  poseDir: (pose: PoseName) => string;
  poseSummaryFile: (pose: PoseName, poseName: string) => string;
}

export function createWorkspacePaths(root: string): WorkspacePaths {
  const resolvedRoot = path.resolve(root);
  const configDir = path.join(resolvedRoot, 'config');
  const cacheDir = path.join(resolvedRoot, 'cache');
  const resultsDir = path.join(resolvedRoot, 'results');
  const tempDir = path.join(resultsDir, 'temp');
  const scoresDir = path.join(resultsDir, 'scores');
  const dockedDir = path.join(resultsDir, 'docked');

  const poseDir = (pose: PoseName): string => {
    const ligandDir = path.join(dockedDir, pose.ligand);
    const modelDir = modelDirectoryName(pose);
    return modelDir ? path.join(ligandDir, modelDir) : ligandDir;
  };

  return {
    root: resolvedRoot,
    configDir,
    cacheDir,
    cacheBackupDir: path.join(cacheDir, 'cache_backup'),
    resultsDir,
    tempDir,
    scoresDir,
    dockedDir,
    checkpointFile: path.join(cacheDir, 'progress_cache.txt'),
    failedTasksFile: path.join(resultsDir, 'failed_docking_attempts.txt'),
    bestLigandsFile: path.join(resultsDir, 'best_ligands.txt'),
    rankedBestLigandsFile: path.join(resultsDir, 'ranked_best_ligands.txt'),
    bestOverallFile: path.join(resultsDir, 'best_ligands_overall.txt'),
    inputDir: (kind) => path.join(resolvedRoot, INPUT_DIRECTORIES[kind]),
    nameListFile: (kind) => path.join(cacheDir, NAME_LIST_FILES[kind]),
    targetConfigFile: (target) => path.join(configDir, `config_${target}.txt`),
    modelsDir: (ligand) => path.join(cacheDir, `models_${ligand}`),
    scoresFile: (target) => path.join(scoresDir, `scores_${target}.txt`),
    scoresCsvFile: (target) => path.join(scoresDir, `scores_${target}.csv`),
    scoresStatsFile: (target) => path.join(scoresDir, `scores_${target}_stats.txt`),
    rmsFile: (reference) => path.join(scoresDir, `scores_${reference}_RMS.txt`),
    deviationFile: (reference, target) =>
      path.join(scoresDir, `scores_${reference}`, `scores_${reference}_in_${target}.txt`),
    tempArtifact: (taskName, kind) =>
      path.join(tempDir, `${taskName}${kind === 'log' ? LOG_EXTENSION : STRUCTURE_EXTENSION}`),
    poseDir,
    poseSummaryFile: (pose, poseName) => path.join(poseDir(pose), `${poseName}_summary.txt`),
  };
}
