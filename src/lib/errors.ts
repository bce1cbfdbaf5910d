/**
 * Error taxonomy for docking runs.
 *
 * Fatal errors abort the whole run with exit code 1. Non-fatal errors are
 * recorded against the task that raised them and the run moves on.
 */

export type DockingErrorKind =
  | 'fatal_input'
  | 'extraction'
  | 'score_parse'
  | 'tool_missing'
  | 'tool_environment'
  | 'config';

export class DockingError extends Error {
  readonly kind: DockingErrorKind;
  readonly fatal: boolean;

  constructor(kind: DockingErrorKind, message: string, fatal: boolean) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.fatal = fatal;
  }

  get exitCode(): number {
    return this.fatal ? 1 : 0;
  }
}

/** Missing or empty input directory, missing checkpoint */
export class FatalInputError extends DockingError {
  constructor(message: string) {
    super('fatal_input', message, true);
  }
}

/** Pose splitter failed or produced zero poses */
export class ExtractionError extends DockingError {
  readonly ligand: string;

  constructor(ligand: string, message: string) {
    super('extraction', message, true);
    this.ligand = ligand;
  }
}

/** Log present but the score token is missing or not numeric */
export class ScoreParseError extends DockingError {
  readonly logFile: string;

  constructor(logFile: string, message: string) {
    super('score_parse', message, false);
    this.logFile = logFile;
  }
}

export class ToolMissingError extends DockingError {
  readonly executable: string;

  constructor(executable: string) {
    super(
      'tool_missing',
      `Executable '${executable}' was not found. Is it installed and on your PATH?`,
      true,
    );
    this.executable = executable;
  }
}

/** The tool ran but left no log behind */
export class ToolEnvironmentError extends DockingError {
  constructor(message: string) {
    super('tool_environment', message, true);
  }
}

export class ConfigError extends DockingError {
  constructor(message: string) {
    super('config', message, true);
  }
}

/**
 * Cancellation surfaces as an AbortError, either from an aborted timer or
 * from checkAborted(). Neither is a failure.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function abortError(message = 'Run cancelled'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function checkAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw abortError();
  }
}

export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
