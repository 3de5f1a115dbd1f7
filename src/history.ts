/**
 * history.ts — Chat history kept as timestamped text lines.
 */

import { existsSync } from 'node:fs';
import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Where chat lines are recorded. The engine only appends and reads back.
 */
export interface HistoryLog {
  append(entry: string): Promise<void>;
  /** Last `count` lines, oldest first */
  tail(count: number): Promise<string[]>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Append-only history file: one `timestamp - entry` line per message.
 */
export class HistoryFile implements HistoryLog {
  private path: string;
  private now: () => Date;

  constructor(path: string, now?: () => Date) {
    this.path = path;
    this.now = now ?? (() => new Date());
  }

  async append(entry: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${formatTimestamp(this.now())} - ${entry}\n`, 'utf-8');
  }

  async tail(count: number): Promise<string[]> {
    if (!existsSync(this.path)) {
      return [];
    }
    const content = await readFile(this.path, 'utf-8');
    const lines = content.split('\n').filter(line => line !== '');
    return lines.slice(-count);
  }
}

/**
 * History that lives only in memory (used when no file is configured).
 */
export class MemoryHistory implements HistoryLog {
  private entries: string[] = [];

  async append(entry: string): Promise<void> {
    this.entries.push(entry);
  }

  async tail(count: number): Promise<string[]> {
    return this.entries.slice(-count);
  }
}
