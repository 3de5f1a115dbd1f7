import { EventEmitter } from 'node:events';
import { decodeMessage, type DecodeFailure } from '../protocol/codec.js';
import type { Message } from '../protocol/messages.js';
import type { DatagramTransport, RemoteEndpoint } from '../transport/udp.js';
import { errorMessage, type Logger } from '../utils.js';
import type { Dispatcher } from './dispatcher.js';

/**
 * Events emitted by ReceiverLoop
 */
export interface ReceiverLoopEvents {
  /** A datagram decoded; emitted before it is dispatched */
  'message': (message: Message, from: RemoteEndpoint) => void;
  'malformed': (reason: DecodeFailure, payload: string, from: RemoteEndpoint) => void;
  'error': (error: Error) => void;
}

export interface InboundCounters {
  received: number;
  malformed: number;
  dispatched: number;
}

/**
 * Owns the inbound side of the socket. Datagrams are decoded and dispatched
 * one at a time in arrival order; the next one waits until the previous
 * dispatch has settled.
 */
export class ReceiverLoop extends EventEmitter {
  private transport: DatagramTransport;
  private dispatcher: Dispatcher;
  private logger: Logger | null;
  private chain: Promise<void> = Promise.resolve();
  private attached = false;
  private running = false;
  private counters: InboundCounters = { received: 0, malformed: 0, dispatched: 0 };

  constructor(transport: DatagramTransport, dispatcher: Dispatcher, logger?: Logger) {
    super();
    this.transport = transport;
    this.dispatcher = dispatcher;
    this.logger = logger ?? null;
  }

  start(): void {
    if (!this.attached) {
      this.transport.onDatagram((payload, from) => {
        if (this.running) {
          void this.handleDatagram(payload, from);
        }
      });
      this.attached = true;
    }
    this.running = true;
  }

  /**
   * Stop accepting datagrams. Work already queued still runs.
   */
  stop(): void {
    this.running = false;
  }

  /**
   * Queue one datagram behind those already received.
   *
   * @returns Resolves once this datagram has been fully processed
   */
  handleDatagram(payload: string, from: RemoteEndpoint): Promise<void> {
    this.chain = this.chain
      .then(() => this.process(payload, from))
      .catch((err: unknown) => {
        // A throwing listener must not stall the datagrams queued behind it
        this.logger?.debug(`Datagram from ${from.address}:${from.port} not handled: ${errorMessage(err)}`);
      });
    return this.chain;
  }

  /**
   * Resolves when every queued datagram has been processed.
   */
  idle(): Promise<void> {
    return this.chain;
  }

  getCounters(): InboundCounters {
    return { ...this.counters };
  }

  private async process(payload: string, from: RemoteEndpoint): Promise<void> {
    this.counters.received++;

    const result = decodeMessage(payload);
    if (!result.ok) {
      this.counters.malformed++;
      this.logger?.debug(
        `Malformed datagram from ${from.address}:${from.port} (${result.reason}): ${JSON.stringify(payload)}`
      );
      this.emit('malformed', result.reason, payload, from);
      return;
    }

    try {
      this.emit('message', result.message, from);
      await this.dispatcher.dispatch(result.message);
      this.counters.dispatched++;
    } catch (err) {
      this.logger?.debug(`Failed to handle ${result.message.kind} from ${from.address}: ${errorMessage(err)}`);
      if (this.listenerCount('error') > 0) {
        this.emit('error', err instanceof Error ? err : new Error(errorMessage(err)));
      }
    }
  }
}
