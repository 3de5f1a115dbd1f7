import type { PeerRecord } from './peer.js';
import type { PeerStorage } from './peer-file.js';

/**
 * Outcome of an upsert, as seen by the in-memory map
 */
export type UpsertOutcome = 'added' | 'updated' | 'unchanged';

/**
 * Known peers keyed by address, persisted on every change.
 *
 * Mutations apply to memory synchronously, before the returned promise
 * settles, so concurrent readers see the new state at once. The promise
 * rejects with a PeerStoreError when the write fails.
 */
export class PeerDirectory {
  private peers: Map<string, number> = new Map();
  private storage: PeerStorage;

  constructor(storage: PeerStorage) {
    this.storage = storage;
  }

  /**
   * Merge records from storage into the directory. No liveness check.
   *
   * @returns Number of records read
   */
  async load(): Promise<number> {
    const records = await this.storage.readAll();
    for (const record of records) {
      this.peers.set(record.address, record.port);
    }
    return records.length;
  }

  /**
   * Add a peer or change its port. The same (address, port) pair is a no-op.
   */
  async upsert(address: string, port: number): Promise<UpsertOutcome> {
    const existing = this.peers.get(address);
    if (existing === port) {
      return 'unchanged';
    }

    this.peers.set(address, port);
    if (existing === undefined) {
      await this.storage.append({ address, port });
      return 'added';
    }
    await this.storage.rewrite(this.list());
    return 'updated';
  }

  /**
   * Remove a peer.
   *
   * @returns false if the address was not in the directory
   */
  async remove(address: string): Promise<boolean> {
    if (!this.peers.delete(address)) {
      return false;
    }
    await this.storage.rewrite(this.list());
    return true;
  }

  get(address: string): PeerRecord | undefined {
    const port = this.peers.get(address);
    return port === undefined ? undefined : { address, port };
  }

  has(address: string): boolean {
    return this.peers.has(address);
  }

  get size(): number {
    return this.peers.size;
  }

  /**
   * Snapshot of current records. Order is not meaningful.
   */
  list(): PeerRecord[] {
    return Array.from(this.peers, ([address, port]) => ({ address, port }));
  }
}
