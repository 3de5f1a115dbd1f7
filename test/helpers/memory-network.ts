import type {
  DatagramHandler,
  DatagramTransport,
  SendResult,
  TransportErrorHandler,
} from '../../src/transport/udp.js';
import { nextTurn } from './fakes.js';

const FIRST_EPHEMERAL_PORT = 40000;

/**
 * In-process datagram network. Each transport is pinned to one address.
 * Delivery happens on a later turn; datagrams for an unbound endpoint are
 * dropped.
 */
export class MemoryNetwork {
  private endpoints: Map<string, MemoryTransport> = new Map();
  private nextPort = FIRST_EPHEMERAL_PORT;
  private inFlight = 0;
  dropped = 0;

  transport(address: string): MemoryTransport {
    return new MemoryTransport(this, address);
  }

  register(address: string, port: number, transport: MemoryTransport): number {
    const bound = port === 0 ? this.nextPort++ : port;
    const key = `${address}:${bound}`;
    if (this.endpoints.has(key)) {
      throw new Error(`bind EADDRINUSE ${key}`);
    }
    this.endpoints.set(key, transport);
    return bound;
  }

  unregister(address: string, port: number): void {
    this.endpoints.delete(`${address}:${port}`);
  }

  deliver(payload: string, fromAddress: string, fromPort: number, address: string, port: number): void {
    this.inFlight++;
    setImmediate(() => {
      this.inFlight--;
      const target = this.endpoints.get(`${address}:${port}`);
      if (!target) {
        this.dropped++;
        return;
      }
      target.receive(payload, fromAddress, fromPort);
    });
  }

  /**
   * Wait until nothing is on the wire and every node has drained its queue.
   */
  async settle(nodes: Array<{ idle(): Promise<void> }>): Promise<void> {
    for (let round = 0; round < 100; round++) {
      await nextTurn();
      await Promise.all(nodes.map(node => node.idle()));
      if (this.inFlight === 0) {
        return;
      }
    }
    throw new Error('Network did not settle');
  }
}

export class MemoryTransport implements DatagramTransport {
  private network: MemoryNetwork;
  private address: string;
  private port: number | undefined;
  private datagramHandlers: DatagramHandler[] = [];
  private errorHandlers: TransportErrorHandler[] = [];

  constructor(network: MemoryNetwork, address: string) {
    this.network = network;
    this.address = address;
  }

  async bind(port: number): Promise<void> {
    this.port = this.network.register(this.address, port, this);
  }

  boundPort(): number | undefined {
    return this.port;
  }

  async send(line: string, address: string, port: number): Promise<SendResult> {
    if (this.port === undefined) {
      return { ok: false, error: 'Transport not bound' };
    }
    this.network.deliver(`${line}\n`, this.address, this.port, address, port);
    return { ok: true };
  }

  onDatagram(handler: DatagramHandler): void {
    this.datagramHandlers.push(handler);
  }

  onError(handler: TransportErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  receive(payload: string, fromAddress: string, fromPort: number): void {
    for (const handler of this.datagramHandlers) {
      handler(payload, { address: fromAddress, port: fromPort });
    }
  }

  async close(): Promise<void> {
    if (this.port !== undefined) {
      this.network.unregister(this.address, this.port);
      this.port = undefined;
    }
  }
}
