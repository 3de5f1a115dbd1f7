/** How long a connect probe waits for any reply */
export const DEFAULT_PROBE_TIMEOUT_MS = 3000;

/**
 * Waits for the first datagram from an address. Used by `connect` to tell
 * a live peer from a dead endpoint without a dedicated handshake message.
 */
export class ProbeTracker {
  private waiters: Map<string, Set<(replied: boolean) => void>> = new Map();

  /**
   * @returns true if something arrived from the address before the timeout
   */
  wait(address: string, timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS): Promise<boolean> {
    return new Promise((resolve) => {
      const settle = (replied: boolean): void => {
        clearTimeout(timeout);
        const set = this.waiters.get(address);
        set?.delete(settle);
        if (set && set.size === 0) {
          this.waiters.delete(address);
        }
        resolve(replied);
      };

      const timeout = setTimeout(() => settle(false), timeoutMs);

      let set = this.waiters.get(address);
      if (!set) {
        set = new Set();
        this.waiters.set(address, set);
      }
      set.add(settle);
    });
  }

  /**
   * Something arrived from this address.
   */
  notify(address: string): void {
    const set = this.waiters.get(address);
    if (!set) {
      return;
    }
    for (const settle of Array.from(set)) {
      settle(true);
    }
  }

  pending(): number {
    let count = 0;
    for (const set of this.waiters.values()) count += set.size;
    return count;
  }

  /**
   * Resolve every outstanding probe as failed.
   */
  cancelAll(): void {
    for (const set of Array.from(this.waiters.values())) {
      for (const settle of Array.from(set)) {
        settle(false);
      }
    }
  }
}
