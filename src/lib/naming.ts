/**
 * Naming scheme shared by every component that builds or reads file names.
 *
 *   pose:      <ligand>_model_<k>   (multi-pose ligand, k is 1-based)
 *              <ligand>             (implicit pose of a single-pose ligand)
 *   task:      <pose>_vs_<target>
 *   directory: docked_<ligand>_model<k>
 */

export const STRUCTURE_EXTENSION = '.pdbqt';
export const LOG_EXTENSION = '.log';

const MODEL_SEPARATOR = '_model_';
const TASK_SEPARATOR = '_vs_';

export interface PoseName {
  ligand: string;
  /** Splitter model number; undefined for an implicit single pose */
  model?: number;
}

export interface TaskName {
  pose: PoseName;
  target: string;
}

export function encodePoseName(pose: PoseName): string {
  return pose.model === undefined ? pose.ligand : `${pose.ligand}${MODEL_SEPARATOR}${pose.model}`;
}

export function decodePoseName(name: string): PoseName {
  const index = name.lastIndexOf(MODEL_SEPARATOR);
  if (index > 0) {
    const suffix = name.slice(index + MODEL_SEPARATOR.length);
    if (/^\d+$/.test(suffix)) {
      return { ligand: name.slice(0, index), model: parseInt(suffix, 10) };
    }
  }
  return { ligand: name };
}

export function encodeTaskName(task: TaskName): string {
  return `${encodePoseName(task.pose)}${TASK_SEPARATOR}${task.target}`;
}

export function decodeTaskName(name: string): TaskName | null {
  const index = name.lastIndexOf(TASK_SEPARATOR);
  if (index <= 0) return null;
  const target = name.slice(index + TASK_SEPARATOR.length);
  if (!target) return null;
  return { pose: decodePoseName(name.slice(0, index)), target };
}

/** Directory holding one model's artifacts, e.g. docked_BCABMM_model3 */
export function modelDirectoryName(pose: PoseName): string | null {
  if (pose.model === undefined) return null;
  return `docked_${pose.ligand}_model${pose.model}`;
}

/** File name without its final extension */
export function stemOf(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

export function extensionOf(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot) : '';
}
