/**
 * Tasks for which no valid score could be extracted.
 * Recorded at most once per (name, target); never silently dropped.
 */

import fs from 'node:fs';
import { writeFileAtomic } from './fsUtils';

export interface FailedTask {
  name: string;
  target: string;
  reason: string;
}

export const FAILURE_HEADER = '# Name  Target  Reason';

function keyOf(name: string, target: string): string {
  return `${name}\u0000${target}`;
}

export function parseFailedTasks(content: string): FailedTask[] {
  const tasks: FailedTask[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const match = trimmed.match(/^(\S+)\s+(\S+)\s*(.*)$/);
    if (!match) continue;
    tasks.push({ name: match[1], target: match[2], reason: match[3] });
  }
  return tasks;
}

export function formatFailedTasks(tasks: FailedTask[]): string {
  const rows = tasks.map((t) => (t.reason ? `${t.name} ${t.target} ${t.reason}` : `${t.name} ${t.target}`));
  return [FAILURE_HEADER, ...rows].join('\n') + '\n';
}

export class FailureLedger {
  readonly filePath: string;
  private readonly tasks = new Map<string, FailedTask>();

  constructor(filePath: string) {
    this.filePath = filePath;
    if (fs.existsSync(filePath)) {
      for (const task of parseFailedTasks(fs.readFileSync(filePath, 'utf8'))) {
        this.tasks.set(keyOf(task.name, task.target), task);
      }
    }
  }

  /** Returns false when the pair was already recorded */
  record(task: FailedTask): boolean {
    const key = keyOf(task.name, task.target);
    if (this.tasks.has(key)) return false;
    this.tasks.set(key, { ...task, reason: task.reason.replace(/\s+/g, ' ').trim() });
    this.flush();
    return true;
  }

  /** Drop a stale entry once the pair has been scored */
  resolve(name: string, target: string): boolean {
    const removed = this.tasks.delete(keyOf(name, target));
    if (removed) this.flush();
    return removed;
  }

  has(name: string, target: string): boolean {
    return this.tasks.has(keyOf(name, target));
  }

  list(): FailedTask[] {
    return Array.from(this.tasks.values());
  }

  get size(): number {
    return this.tasks.size;
  }

  flush(): void {
    writeFileAtomic(this.filePath, formatFailedTasks(this.list()));
  }
}
