/**
 * Pose Extraction
 *
 * Splits a multi-pose ligand file into one file per pose using the external
 * splitter. Extracted poses live in cache/models_<ligand>/ as
 * <ligand>_model_<k>.pdbqt; when they already exist the splitter is not run
 * again. A file without MODEL records is a single implicit pose.
 */

import fs from 'node:fs';
import path from 'node:path';
import { ExtractionError, abortError } from './errors';
import { ensureDir } from './fsUtils';
import { STRUCTURE_EXTENSION, encodePoseName, stemOf, type PoseName } from './naming';
import type { ProcessExit, ProcessLauncher } from './processes';
import type { WorkspacePaths } from './paths';

export interface ExtractedPose {
  /** Encoded pose name used in ledgers and artifacts */
  name: string;
  pose: PoseName;
  file: string;
}

export interface PoseExtractorOptions {
  paths: WorkspacePaths;
  splitter: string;
  launcher: ProcessLauncher;
  signal?: AbortSignal;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isMultiPose(content: string): boolean {
  return /^MODEL\b/m.test(content);
}

/** Canonical pose files already in the models directory, by model number */
export function listExtractedPoses(modelsDir: string, ligand: string): ExtractedPose[] {
  if (!fs.existsSync(modelsDir)) return [];

  const pattern = new RegExp(`^${escapeRegExp(ligand)}_model_(\\d+)${escapeRegExp(STRUCTURE_EXTENSION)}$`);
  const poses: ExtractedPose[] = [];

  for (const fileName of fs.readdirSync(modelsDir)) {
    const match = fileName.match(pattern);
    if (!match) continue;
    const pose: PoseName = { ligand, model: parseInt(match[1], 10) };
    poses.push({ name: encodePoseName(pose), pose, file: path.join(modelsDir, fileName) });
  }

  return poses.sort((a, b) => (a.pose.model ?? 0) - (b.pose.model ?? 0));
}

/**
 * Rename splitter output (<prefix><k>.pdbqt, possibly zero-padded) to the
 * canonical <ligand>_model_<k>.pdbqt.
 */
export function canonicalizeSplitterOutput(modelsDir: string, ligand: string): number {
  const pattern = new RegExp(`^${escapeRegExp(ligand)}_model(\\d+)${escapeRegExp(STRUCTURE_EXTENSION)}$`);
  let renamed = 0;

  for (const fileName of fs.readdirSync(modelsDir)) {
    const match = fileName.match(pattern);
    if (!match) continue;
    const model = parseInt(match[1], 10);
    const canonical = `${encodePoseName({ ligand, model })}${STRUCTURE_EXTENSION}`;
    fs.renameSync(path.join(modelsDir, fileName), path.join(modelsDir, canonical));
    renamed++;
  }

  return renamed;
}

export async function extractPoses(ligandFile: string, options: PoseExtractorOptions): Promise<ExtractedPose[]> {
  const { paths, splitter, launcher, signal } = options;
  const ligand = stemOf(ligandFile);

  const content = fs.readFileSync(ligandFile, 'utf8');
  if (!isMultiPose(content)) {
    const pose: PoseName = { ligand };
    return [{ name: encodePoseName(pose), pose, file: ligandFile }];
  }

  const modelsDir = paths.modelsDir(ligand);
  const existing = listExtractedPoses(modelsDir, ligand);
  if (existing.length > 0) {
    console.log(`[Extract] ${ligand}: ${existing.length} poses already extracted`);
    return existing;
  }

  ensureDir(modelsDir);
  const prefix = path.join(modelsDir, `${ligand}_model`);
  console.log(`[Extract] Splitting ${ligand} with ${splitter}...`);

  const child = launcher.launch(splitter, ['--input', ligandFile, '--ligand', prefix]);
  const onAbort = () => child.kill('SIGTERM');
  signal?.addEventListener('abort', onAbort, { once: true });

  let exit: ProcessExit;
  try {
    exit = await child.exited;
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  if (signal?.aborted) {
    throw abortError();
  }
  if (exit.code !== 0) {
    throw new ExtractionError(
      ligand,
      `${splitter} failed on ${ligandFile} (exit ${exit.code ?? exit.signal ?? 'unknown'})`,
    );
  }

  canonicalizeSplitterOutput(modelsDir, ligand);
  const poses = listExtractedPoses(modelsDir, ligand);
  if (poses.length === 0) {
    throw new ExtractionError(ligand, `${splitter} produced no poses for ${ligandFile}`);
  }

  console.log(`[Extract] ${ligand}: ${poses.length} poses`);
  return poses;
}
