/**
 * Checkpoint cursors for the nested task iteration.
 *
 * Reference phase:  referenceLigand ⊃ referenceTarget
 * Main phase:       ligand ⊃ pose ⊃ target
 *
 * The cursors always point at the next unit of work. They are persisted as
 * five KEY=INTEGER lines, written to a temporary sibling and renamed over the
 * checkpoint so an interrupted write never truncates it.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { FatalInputError } from './errors';

export type CursorName = 'referenceLigand' | 'referenceTarget' | 'ligand' | 'pose' | 'target';

export type CheckpointCursors = Record<CursorName, number>;

export const CURSOR_ORDER: readonly CursorName[] = [
  'referenceLigand',
  'referenceTarget',
  'ligand',
  'pose',
  'target',
];

const CURSOR_KEYS: Record<CursorName, string> = {
  referenceLigand: 'REFERENCE_LIGAND_INDEX',
  referenceTarget: 'REFERENCE_TARGET_INDEX',
  ligand: 'LIGAND_INDEX',
  pose: 'POSE_INDEX',
  target: 'TARGET_INDEX',
};

// Key names written by earlier releases
const LEGACY_KEYS: Record<string, CursorName> = {
  COMPARISON_LIGAND_INDEX: 'referenceLigand',
  COMPARISON_PROTEIN_INDEX: 'referenceTarget',
  MODEL_INDEX: 'pose',
  PROTEIN_INDEX: 'target',
};

/** Cursors reset to zero when the key cursor advances */
const NESTED_CURSORS: Record<CursorName, readonly CursorName[]> = {
  referenceLigand: ['referenceTarget'],
  referenceTarget: [],
  ligand: ['pose', 'target'],
  pose: ['target'],
  target: [],
};

const cursorValueSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => parseInt(value, 10));

export function initialCursors(): CheckpointCursors {
  return { referenceLigand: 0, referenceTarget: 0, ligand: 0, pose: 0, target: 0 };
}

export function advanceCursors(cursors: CheckpointCursors, cursor: CursorName): CheckpointCursors {
  const next: CheckpointCursors = { ...cursors, [cursor]: cursors[cursor] + 1 };
  for (const nested of NESTED_CURSORS[cursor]) {
    next[nested] = 0;
  }
  return next;
}

export function formatCheckpoint(cursors: CheckpointCursors): string {
  return CURSOR_ORDER.map((name) => `${CURSOR_KEYS[name]}=${cursors[name]}`).join('\n') + '\n';
}

function cursorForKey(key: string): CursorName | undefined {
  const current = CURSOR_ORDER.find((name) => CURSOR_KEYS[name] === key);
  return current ?? LEGACY_KEYS[key];
}

export function parseCheckpoint(content: string, source = 'checkpoint'): CheckpointCursors {
  const cursors = initialCursors();

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const eq = trimmed.indexOf('=');
    if (eq < 0) {
      throw new FatalInputError(`Malformed line in ${source}: '${trimmed}'`);
    }
    const key = trimmed.slice(0, eq).trim();
    const cursor = cursorForKey(key);
    if (!cursor) {
      console.warn(`[Session] Ignoring unknown checkpoint key ${key}`);
      continue;
    }

    const rawValue = trimmed.slice(eq + 1).trim();
    const value = cursorValueSchema.safeParse(rawValue);
    if (!value.success) {
      throw new FatalInputError(`Checkpoint value for ${key} must be a non-negative integer, got '${rawValue}'`);
    }
    cursors[cursor] = value.data;
  }

  return cursors;
}

export class CheckpointFile {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /** Write an all-zero checkpoint unless one is already there */
  initialize(): void {
    if (!this.exists()) {
      this.save(initialCursors());
    }
  }

  load(): CheckpointCursors {
    if (!this.exists()) {
      throw new FatalInputError(`Checkpoint file not found: ${this.filePath}`);
    }
    return parseCheckpoint(fs.readFileSync(this.filePath, 'utf8'), this.filePath);
  }

  save(cursors: CheckpointCursors): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tempPath, formatCheckpoint(cursors), 'utf8');
    fs.renameSync(tempPath, this.filePath);
  }
}
