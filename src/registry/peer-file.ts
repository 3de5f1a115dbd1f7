/**
 * peer-file.ts — Plain-text storage for the peer directory.
 *
 * One record per line, `address port`. New records are appended; removals
 * and port changes rewrite the whole file through a temp file and rename.
 */

import { existsSync } from 'node:fs';
import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { PeerRecord } from './peer.js';

export type PeerFileOperation = 'read' | 'append' | 'rewrite';

/**
 * A read or write of the peer file failed. The in-memory directory is not
 * rolled back; only persistence for that call is lost.
 */
export class PeerStoreError extends Error {
  readonly path: string;
  readonly operation: PeerFileOperation;

  constructor(operation: PeerFileOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} peer file ${path}: ${reason}`, { cause });
    this.name = 'PeerStoreError';
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Storage backend behind the peer directory
 */
export interface PeerStorage {
  readAll(): Promise<PeerRecord[]>;
  append(record: PeerRecord): Promise<void>;
  rewrite(records: PeerRecord[]): Promise<void>;
}

/**
 * Parse the file body. Lines that are not `address port` with an integer
 * port are skipped; nothing else is checked.
 */
export function parsePeerLines(content: string): PeerRecord[] {
  const records: PeerRecord[] = [];
  for (const line of content.split('\n')) {
    const [address, rawPort, ...rest] = line.trim().split(/\s+/);
    if (!address || !rawPort || rest.length > 0 || !/^\d+$/.test(rawPort)) {
      continue;
    }
    records.push({ address, port: parseInt(rawPort, 10) });
  }
  return records;
}

export function formatPeerLine(record: PeerRecord): string {
  return `${record.address} ${record.port}\n`;
}

/**
 * File-backed peer storage. Writes are queued so an append and a rewrite
 * issued back to back land in the order they were requested.
 */
export class PeerFile implements PeerStorage {
  private path: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
  }

  getPath(): string {
    return this.path;
  }

  async readAll(): Promise<PeerRecord[]> {
    if (!existsSync(this.path)) {
      return [];
    }
    try {
      const content = await readFile(this.path, 'utf-8');
      return parsePeerLines(content);
    } catch (err) {
      throw new PeerStoreError('read', this.path, err);
    }
  }

  append(record: PeerRecord): Promise<void> {
    return this.enqueue('append', async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, formatPeerLine(record), 'utf-8');
    });
  }

  rewrite(records: PeerRecord[]): Promise<void> {
    return this.enqueue('rewrite', async () => {
      await mkdir(dirname(this.path), { recursive: true });
      const tmpPath = `${this.path}.tmp`;
      await writeFile(tmpPath, records.map(formatPeerLine).join(''), 'utf-8');
      await rename(tmpPath, this.path);
    });
  }

  private enqueue(operation: PeerFileOperation, write: () => Promise<void>): Promise<void> {
    const run = this.queue.then(write).catch((err: unknown) => {
      throw new PeerStoreError(operation, this.path, err);
    });
    // Keep the queue alive after a failed write
    this.queue = run.catch(() => undefined);
    return run;
  }
}
