import type { PresenceEntry } from './peer.js';

/** Liveness window: an entry is stale once this much time passes unseen */
export const DEFAULT_PRESENCE_TTL_MS = 300_000;

export type Clock = () => number;

export interface PresenceRegistryOptions {
  ttlMs?: number;
  now?: Clock;
}

/**
 * Who is believed to be online, keyed by (display name, address).
 *
 * The same address may appear under several names at once until the old
 * ones expire or are removed. Stale entries are evicted lazily by the
 * reading operations; there is no sweep timer.
 */
export class PresenceRegistry {
  /** name -> address -> lastSeenAt */
  private entries: Map<string, Map<string, number>> = new Map();
  private ttlMs: number;
  private now: Clock;

  constructor(options: PresenceRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_PRESENCE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record that (name, address) was seen now.
   */
  touch(name: string, address: string): void {
    let byAddress = this.entries.get(name);
    if (!byAddress) {
      byAddress = new Map();
      this.entries.set(name, byAddress);
    }
    byAddress.set(address, this.now());
  }

  /**
   * @returns true if the entry existed
   */
  remove(name: string, address: string): boolean {
    const byAddress = this.entries.get(name);
    if (!byAddress || !byAddress.delete(address)) {
      return false;
    }
    if (byAddress.size === 0) {
      this.entries.delete(name);
    }
    return true;
  }

  /**
   * Drop every name associated with an address.
   *
   * @returns Number of entries removed
   */
  removeByAddress(address: string): number {
    let removed = 0;
    for (const [name, byAddress] of this.entries) {
      if (byAddress.delete(address)) {
        removed++;
      }
      if (byAddress.size === 0) {
        this.entries.delete(name);
      }
    }
    return removed;
  }

  /**
   * Move an address from one name to another in a single step.
   */
  rename(oldName: string, newName: string, address: string): void {
    this.remove(oldName, address);
    this.touch(newName, address);
  }

  /**
   * Live entries. Stale entries met along the way are evicted.
   */
  list(): PresenceEntry[] {
    const live: PresenceEntry[] = [];
    for (const name of Array.from(this.entries.keys())) {
      for (const [address, lastSeenAt] of this.liveAddresses(name)) {
        live.push({ name, address, lastSeenAt });
      }
    }
    return live;
  }

  /**
   * Address of the live entry for a name. When several addresses share the
   * name, the most recently seen wins; on a tie, the one inserted first.
   */
  resolveAddress(name: string): string | undefined {
    let best: { address: string; lastSeenAt: number } | undefined;
    for (const [address, lastSeenAt] of this.liveAddresses(name)) {
      if (!best || lastSeenAt > best.lastSeenAt) {
        best = { address, lastSeenAt };
      }
    }
    return best?.address;
  }

  isLive(name: string, address: string): boolean {
    const lastSeenAt = this.entries.get(name)?.get(address);
    return lastSeenAt !== undefined && this.now() - lastSeenAt < this.ttlMs;
  }

  /**
   * Live (address, lastSeenAt) pairs for one name, evicting stale ones.
   */
  private liveAddresses(name: string): Array<[string, number]> {
    const byAddress = this.entries.get(name);
    if (!byAddress) {
      return [];
    }

    const now = this.now();
    const live: Array<[string, number]> = [];
    for (const [address, lastSeenAt] of byAddress) {
      if (now - lastSeenAt < this.ttlMs) {
        live.push([address, lastSeenAt]);
      } else {
        byAddress.delete(address);
      }
    }
    if (byAddress.size === 0) {
      this.entries.delete(name);
    }
    return live;
  }
}
