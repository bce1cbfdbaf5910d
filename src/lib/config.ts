/**
 * Run configuration and per-target override files.
 *
 * Environment variables supply defaults for a run; CLI flags override the
 * root directory and debug mode. Everything is validated with zod before the
 * run starts so a bad value fails fast instead of mid-batch.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_ROOT = './dock';
export const DEFAULT_SCORING_TOOL = 'vina';
export const DEFAULT_SPLITTER = 'vina_split';
export const DEFAULT_POLL_INTERVAL_MS = 200;
export const DEFAULT_TOOL_TIMEOUT_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_KILL_GRACE_MS = 10_000;
export const DEFAULT_BOX_SIZE = 20;

/** Empty strings count as "not set" so `DOCK_CPU=` behaves like an unset variable */
function optionalNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed === '' ? undefined : Number(trimmed);
    }
    return value;
  }, schema.optional());
}

export const toolParamsSchema = z.object({
  cpu: optionalNumber(z.number().int().positive()),
  exhaustiveness: optionalNumber(z.number().int().positive()),
  energyRange: optionalNumber(z.number().positive()),
  numModes: optionalNumber(z.number().int().positive()),
});

export type ToolParams = z.infer<typeof toolParamsSchema>;

export const runConfigSchema = z.object({
  root: z.string().min(1, 'Working root is required'),
  scoringTool: z.string().min(1, 'Scoring tool executable is required'),
  splitter: z.string().min(1, 'Splitter executable is required'),
  pollIntervalMs: z.number().int().positive(),
  /** 0 disables the timeout */
  toolTimeoutMs: z.number().int().nonnegative(),
  /** Wait after SIGTERM before a timed-out tool gets SIGKILL */
  killGraceMs: z.number().int().nonnegative(),
  debug: z.boolean(),
  toolParams: toolParamsSchema,
});

export type RunConfig = z.infer<typeof runConfigSchema>;

export interface RunConfigOverrides {
  root?: string;
  debug?: boolean;
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
}

export function loadRunConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RunConfigOverrides = {},
): RunConfig {
  const result = runConfigSchema.safeParse({
    root: overrides.root || env.DOCK_ROOT || DEFAULT_ROOT,
    scoringTool: env.DOCK_SCORING_TOOL || DEFAULT_SCORING_TOOL,
    splitter: env.DOCK_SPLITTER || DEFAULT_SPLITTER,
    pollIntervalMs: numberFromEnv(env.DOCK_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
    toolTimeoutMs: numberFromEnv(env.DOCK_TOOL_TIMEOUT_MS, DEFAULT_TOOL_TIMEOUT_MS),
    killGraceMs: numberFromEnv(env.DOCK_KILL_GRACE_MS, DEFAULT_KILL_GRACE_MS),
    debug: overrides.debug ?? env.DOCK_DEBUG === 'true',
    toolParams: {
      cpu: env.DOCK_CPU,
      exhaustiveness: env.DOCK_EXHAUSTIVENESS,
      energyRange: env.DOCK_ENERGY_RANGE,
      numModes: env.DOCK_NUM_MODES,
    },
  });

  if (!result.success) {
    throw new ConfigError(`Invalid run configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// ---- Per-target override files ----

export const targetOverrideSchema = z.object({
  center_x: optionalNumber(z.number()),
  center_y: optionalNumber(z.number()),
  center_z: optionalNumber(z.number()),
  size_x: optionalNumber(z.number().positive()),
  size_y: optionalNumber(z.number().positive()),
  size_z: optionalNumber(z.number().positive()),
  cpu: optionalNumber(z.number().int().positive()),
  exhaustiveness: optionalNumber(z.number().int().positive()),
  energy_range: optionalNumber(z.number().positive()),
  num_modes: optionalNumber(z.number().int().positive()),
});

export type TargetOverride = z.infer<typeof targetOverrideSchema>;

/**
 * Parse a Vina-style conf file: `key = value` lines, `#` comments.
 * Unknown keys (receptor, ligand, out, ...) are ignored.
 */
export function parseTargetOverride(content: string, source = 'override'): TargetOverride {
  const raw: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim().toLowerCase();
    raw[key] = trimmed.slice(eq + 1).trim();
  }

  const result = targetOverrideSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid target configuration in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function readTargetOverride(filePath: string): TargetOverride | null {
  if (!fs.existsSync(filePath)) return null;
  return parseTargetOverride(fs.readFileSync(filePath, 'utf8'), filePath);
}

/** Tool parameters from the override file win over the run defaults */
export function mergeToolParams(defaults: ToolParams, override: TargetOverride | null): ToolParams {
  if (!override) return defaults;
  return {
    cpu: override.cpu ?? defaults.cpu,
    exhaustiveness: override.exhaustiveness ?? defaults.exhaustiveness,
    energyRange: override.energy_range ?? defaults.energyRange,
    numModes: override.num_modes ?? defaults.numModes,
  };
}
