/**
 * Docking Box Resolution
 * Search region handed to the scoring tool for one target
 */

import fs from 'node:fs';
import { DEFAULT_BOX_SIZE, readTargetOverride, type TargetOverride } from './config';

export interface DockingBox {
  centerX: number;
  centerY: number;
  centerZ: number;
  sizeX: number;
  sizeY: number;
  sizeZ: number;
}

export type DockingBoxSource = 'config' | 'centroid';

export interface ResolvedDockingBox {
  box: DockingBox;
  source: DockingBoxSource;
  /** Number of ATOM records averaged; 0 when the box came from config */
  atomCount: number;
  override: TargetOverride | null;
}

interface Coordinate {
  x: number;
  y: number;
  z: number;
}

/**
 * Parse ATOM record coordinates from PDB/PDBQT content.
 * Columns 31-54 hold x, y, z in fixed 8-character fields.
 */
export function parseAtomCoordinates(content: string): Coordinate[] {
  const coords: Coordinate[] = [];

  for (const line of content.split(/\r?\n/)) {
    if (!line.startsWith('ATOM')) continue;

    const x = parseFloat(line.slice(30, 38));
    const y = parseFloat(line.slice(38, 46));
    const z = parseFloat(line.slice(46, 54));

    if (!isNaN(x) && !isNaN(y) && !isNaN(z)) {
      coords.push({ x, y, z });
    }
  }

  return coords;
}

/** Coordinate centroid with the fixed default extent on each axis */
export function centroidBox(coords: Coordinate[], size = DEFAULT_BOX_SIZE): DockingBox {
  const center: [number, number, number] = [0, 0, 0];
  for (const c of coords) {
    center[0] += c.x;
    center[1] += c.y;
    center[2] += c.z;
  }
  if (coords.length > 0) {
    center[0] /= coords.length;
    center[1] /= coords.length;
    center[2] /= coords.length;
  }

  return {
    centerX: center[0],
    centerY: center[1],
    centerZ: center[2],
    sizeX: size,
    sizeY: size,
    sizeZ: size,
  };
}

/** A box from the override file, only when all six fields are filled */
export function boxFromOverride(override: TargetOverride | null): DockingBox | null {
  if (!override) return null;
  const { center_x, center_y, center_z, size_x, size_y, size_z } = override;
  if (
    center_x === undefined ||
    center_y === undefined ||
    center_z === undefined ||
    size_x === undefined ||
    size_y === undefined ||
    size_z === undefined
  ) {
    return null;
  }
  return {
    centerX: center_x,
    centerY: center_y,
    centerZ: center_z,
    sizeX: size_x,
    sizeY: size_y,
    sizeZ: size_z,
  };
}

export function resolveDockingBox(targetFile: string, overrideFile: string): ResolvedDockingBox {
  const override = readTargetOverride(overrideFile);
  const configured = boxFromOverride(override);
  if (configured) {
    return { box: configured, source: 'config', atomCount: 0, override };
  }

  const coords = parseAtomCoordinates(fs.readFileSync(targetFile, 'utf8'));
  if (coords.length === 0) {
    console.warn(`[Dock] No ATOM records in ${targetFile}; box centered at the origin`);
  }
  return { box: centroidBox(coords), source: 'centroid', atomCount: coords.length, override };
}

export function boxToArgs(box: DockingBox): string[] {
  return [
    '--center_x', String(box.centerX),
    '--center_y', String(box.centerY),
    '--center_z', String(box.centerZ),
    '--size_x', String(box.sizeX),
    '--size_y', String(box.sizeY),
    '--size_z', String(box.sizeZ),
  ];
}
