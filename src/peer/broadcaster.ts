import { encodeMessage } from '../protocol/codec.js';
import type { Message } from '../protocol/messages.js';
import type { PeerDirectory } from '../registry/peer-directory.js';
import type { DatagramTransport, SendResult } from '../transport/udp.js';
import type { Logger } from '../utils.js';

export interface BroadcastResult {
  sent: number;
  failed: number;
}

export interface OutboundCounters {
  sent: number;
  failed: number;
}

/**
 * Outbound path for every datagram the engine produces: fan-out to the
 * whole directory, or unicast to one endpoint. Sends are independent and
 * never retried; a failure is counted and logged, nothing more.
 */
export class Broadcaster {
  private directory: PeerDirectory;
  private transport: DatagramTransport;
  private logger: Logger | null;
  private counters: OutboundCounters = { sent: 0, failed: 0 };

  constructor(directory: PeerDirectory, transport: DatagramTransport, logger?: Logger) {
    this.directory = directory;
    this.transport = transport;
    this.logger = logger ?? null;
  }

  /**
   * Send a message to every peer in the directory concurrently.
   */
  async broadcast(message: Message): Promise<BroadcastResult> {
    const line = encodeMessage(message);
    const peers = this.directory.list();
    const results = await Promise.all(
      peers.map(peer => this.sendLine(line, peer.address, peer.port))
    );

    const sent = results.filter(r => r.ok).length;
    return { sent, failed: results.length - sent };
  }

  /**
   * Send a message to a single endpoint.
   */
  sendTo(message: Message, address: string, port: number): Promise<SendResult> {
    return this.sendLine(encodeMessage(message), address, port);
  }

  getCounters(): OutboundCounters {
    return { ...this.counters };
  }

  private async sendLine(line: string, address: string, port: number): Promise<SendResult> {
    const result = await this.transport.send(line, address, port);
    if (result.ok) {
      this.counters.sent++;
    } else {
      this.counters.failed++;
      this.logger?.debug(`Send to ${address}:${port} failed: ${result.error}`);
    }
    return result;
  }
}
