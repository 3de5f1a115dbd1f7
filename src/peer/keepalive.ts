import type { PingMessage } from '../protocol/messages.js';
import { errorMessage, type Logger } from '../utils.js';
import type { BroadcastResult, Broadcaster } from './broadcaster.js';
import type { LocalIdentity } from './types.js';

export const DEFAULT_KEEPALIVE_MS = 60_000;

export interface KeepaliveOptions {
  intervalMs?: number;
  logger?: Logger;
}

/**
 * Periodically pings every known peer so they keep us in their presence
 * registry and can repair the port they have on record for us.
 */
export class KeepaliveScheduler {
  private identity: LocalIdentity;
  private broadcaster: Broadcaster;
  private intervalMs: number;
  private logger: Logger | null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<BroadcastResult> | null = null;

  constructor(identity: LocalIdentity, broadcaster: Broadcaster, options: KeepaliveOptions = {}) {
    this.identity = identity;
    this.broadcaster = broadcaster;
    this.intervalMs = options.intervalMs ?? DEFAULT_KEEPALIVE_MS;
    this.logger = options.logger ?? null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        this.logger?.debug(`Keepalive failed: ${errorMessage(err)}`);
      });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Broadcast one ping. A tick requested while the previous one is still
   * sending returns null and sends nothing.
   */
  async tick(): Promise<BroadcastResult | null> {
    if (this.inFlight) {
      return null;
    }

    const ping: PingMessage = {
      kind: 'ping',
      name: this.identity.name,
      address: this.identity.address,
      replyPort: this.identity.port,
    };

    this.inFlight = this.broadcaster.broadcast(ping);
    try {
      const result = await this.inFlight;
      this.logger?.debug(`Keepalive ping sent to ${result.sent} peer(s), ${result.failed} failed`);
      return result;
    } finally {
      this.inFlight = null;
    }
  }
}
