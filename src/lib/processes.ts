/**
 * Child process wrapper for the external tools (scoring tool, pose splitter).
 *
 * Components depend on the ProcessLauncher interface; tests substitute an
 * in-process fake that writes the files a real tool would.
 */

import fs from 'node:fs';
import { spawn, type ChildProcess } from 'node:child_process';
import { ToolMissingError } from './errors';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface LaunchOptions {
  /** stdout and stderr are written here; discarded when omitted */
  logFile?: string;
  cwd?: string;
}

export interface LaunchedProcess {
  readonly exited: Promise<ProcessExit>;
  kill(signal?: NodeJS.Signals): void;
}

export interface ProcessLauncher {
  launch(command: string, args: string[], options?: LaunchOptions): LaunchedProcess;
}

export const nodeProcessLauncher: ProcessLauncher = {
  launch(command, args, options = {}) {
    const fd = options.logFile ? fs.openSync(options.logFile, 'w') : null;
    const output = fd === null ? 'ignore' : fd;

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', output, output],
      });
    } finally {
      // The child holds its own copy of the descriptor
      if (fd !== null) fs.closeSync(fd);
    }

    const exited = new Promise<ProcessExit>((resolve, reject) => {
      child.once('error', (err: NodeJS.ErrnoException) => {
        reject(err.code === 'ENOENT' ? new ToolMissingError(command) : err);
      });
      child.once('exit', (code, signal) => {
        resolve({ code, signal });
      });
    });

    return {
      exited,
      kill(signal: NodeJS.Signals = 'SIGTERM') {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill(signal);
        }
      },
    };
  },
};
