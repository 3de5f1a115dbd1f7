import { EventEmitter } from 'node:events';
import type { HistoryLog } from './history.js';
import {
  senderOf,
  type ChatMessage,
  type JoinMessage,
  type LeaveMessage,
  type Message,
  type PrivateMessage,
} from './protocol/messages.js';
import { PeerDirectory } from './registry/peer-directory.js';
import type { PeerStorage } from './registry/peer-file.js';
import { PresenceRegistry, type Clock } from './registry/presence.js';
import { Broadcaster, type BroadcastResult } from './peer/broadcaster.js';
import { CommandExecutor, type CommandResult } from './peer/commands.js';
import { Dispatcher } from './peer/dispatcher.js';
import { KeepaliveScheduler } from './peer/keepalive.js';
import { ProbeTracker } from './peer/probe.js';
import { ReceiverLoop } from './peer/receiver.js';
import type { LocalIdentity } from './peer/types.js';
import type { DatagramTransport, RemoteEndpoint } from './transport/udp.js';
import { errorMessage, type Logger } from './utils.js';

/**
 * Settings for one chat node
 */
export interface ChatNodeConfig {
  name: string;
  /** Address advertised to peers */
  address: string;
  /** Port to listen on; 0 picks a free one */
  port: number;
  /** Port assumed for peers learned without one (defaults to the listening port) */
  discoveryPort?: number;
  ttlMs?: number;
  keepaliveMs?: number;
  probeTimeoutMs?: number;
}

/**
 * Collaborators a node is built from
 */
export interface ChatNodeDeps {
  transport: DatagramTransport;
  storage: PeerStorage;
  history?: HistoryLog;
  logger?: Logger;
  now?: Clock;
}

export interface ChatNodeStats {
  received: number;
  malformed: number;
  dispatched: number;
  sent: number;
  sendFailures: number;
  peers: number;
  liveUsers: number;
}

/**
 * Events emitted by ChatNode
 */
export interface ChatNodeEvents {
  'chat': (message: ChatMessage) => void;
  'private': (message: PrivateMessage) => void;
  'peer-joined': (name: string, address: string) => void;
  'peer-left': (name: string, address: string) => void;
  'peer-renamed': (oldName: string, newName: string, address: string) => void;
  'malformed': (reason: string, payload: string, from: RemoteEndpoint) => void;
  'error': (error: Error) => void;
}

type NodeState = 'idle' | 'running' | 'stopped';

/**
 * One peer of the chat: owns the socket, the peer directory and the
 * presence registry, and wires receiver, keepalive and commands around them.
 */
export class ChatNode extends EventEmitter {
  readonly identity: LocalIdentity;
  readonly directory: PeerDirectory;
  readonly presence: PresenceRegistry;
  private transport: DatagramTransport;
  private broadcaster: Broadcaster;
  private dispatcher: Dispatcher;
  private receiver: ReceiverLoop;
  private keepalive: KeepaliveScheduler;
  private probes = new ProbeTracker();
  private commands: CommandExecutor;
  private history: HistoryLog | null;
  private logger: Logger | null;
  private state: NodeState = 'idle';

  constructor(config: ChatNodeConfig, deps: ChatNodeDeps) {
    super();
    this.identity = { name: config.name, address: config.address, port: config.port };
    this.transport = deps.transport;
    this.history = deps.history ?? null;
    this.logger = deps.logger ?? null;

    this.directory = new PeerDirectory(deps.storage);
    this.presence = new PresenceRegistry({ ttlMs: config.ttlMs, now: deps.now });
    this.broadcaster = new Broadcaster(this.directory, this.transport, deps.logger);

    this.dispatcher = new Dispatcher({
      identity: this.identity,
      directory: this.directory,
      presence: this.presence,
      broadcaster: this.broadcaster,
      history: deps.history,
      discoveryPort: config.discoveryPort,
      logger: deps.logger,
    });
    this.receiver = new ReceiverLoop(this.transport, this.dispatcher, deps.logger);
    this.keepalive = new KeepaliveScheduler(this.identity, this.broadcaster, {
      intervalMs: config.keepaliveMs,
      logger: deps.logger,
    });
    this.commands = new CommandExecutor({
      identity: this.identity,
      directory: this.directory,
      presence: this.presence,
      broadcaster: this.broadcaster,
      probes: this.probes,
      history: deps.history,
      probeTimeoutMs: config.probeTimeoutMs,
      logger: deps.logger,
    });

    // Forward dispatcher events
    for (const event of ['chat', 'private', 'peer-joined', 'peer-left', 'peer-renamed'] as const) {
      this.dispatcher.on(event, (...args: unknown[]) => this.emit(event, ...args));
    }
    this.dispatcher.on('error', (error: Error) => this.reportError(error));

    this.receiver.on('message', (message: Message, from: RemoteEndpoint) => {
      this.probes.notify(from.address);
      this.probes.notify(senderOf(message).address);
    });
    this.receiver.on('malformed', (reason: string, payload: string, from: RemoteEndpoint) => {
      this.emit('malformed', reason, payload, from);
    });
    this.receiver.on('error', (error: Error) => this.reportError(error));

    this.transport.onError((error) => this.reportError(error));
  }

  /**
   * Bind the socket, register ourselves, load known peers and announce.
   * Rejects if the port cannot be bound; nothing else has happened then.
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error('Node already started');
    }

    await this.transport.bind(this.identity.port);
    this.identity.port = this.transport.boundPort() ?? this.identity.port;
    this.state = 'running';

    this.presence.touch(this.identity.name, this.identity.address);

    try {
      const loaded = await this.directory.load();
      this.logger?.debug(`Loaded ${loaded} peer(s)`);
    } catch (err) {
      this.reportError(err);
    }

    this.receiver.start();
    this.keepalive.start();

    if (this.directory.size > 0) {
      const join: JoinMessage = { kind: 'join', name: this.identity.name, address: this.identity.address };
      await this.broadcaster.broadcast(join);
    }
  }

  /**
   * Feed one datagram through decode and dispatch, behind anything queued.
   */
  handleInbound(datagram: string, from: RemoteEndpoint): Promise<void> {
    return this.receiver.handleDatagram(datagram, from);
  }

  handleCommand(name: string, args: string[]): Promise<CommandResult> {
    return this.commands.execute(name, args);
  }

  /**
   * Send a public chat line to every known peer.
   *
   * @throws WireFormatError if the text contains a line break
   */
  async sendChat(text: string): Promise<BroadcastResult> {
    const message: ChatMessage = {
      kind: 'chat',
      sender: this.identity.name,
      address: this.identity.address,
      text,
    };
    const result = await this.broadcaster.broadcast(message);
    try {
      await this.history?.append(`${this.identity.name}: ${text}`);
    } catch (err) {
      this.reportError(err);
    }
    return result;
  }

  /**
   * One keepalive round, as the scheduler would run it.
   */
  tick(): Promise<BroadcastResult | null> {
    return this.keepalive.tick();
  }

  /**
   * Announce that we leave (bounded by the send timeout), then stop timers
   * and close the socket. Safe to call more than once.
   */
  async shutdown(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }
    const wasRunning = this.state === 'running';
    this.state = 'stopped';

    this.keepalive.stop();
    this.receiver.stop();
    this.probes.cancelAll();

    if (wasRunning) {
      const leave: LeaveMessage = { kind: 'leave', name: this.identity.name, address: this.identity.address };
      const result = await this.broadcaster.broadcast(leave);
      this.logger?.debug(`Leave sent to ${result.sent} peer(s), ${result.failed} failed`);
    }
    await this.transport.close();
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Resolves once every received datagram has been handled.
   */
  idle(): Promise<void> {
    return this.receiver.idle();
  }

  getStats(): ChatNodeStats {
    const inbound = this.receiver.getCounters();
    const outbound = this.broadcaster.getCounters();
    return {
      received: inbound.received,
      malformed: inbound.malformed,
      dispatched: inbound.dispatched,
      sent: outbound.sent,
      sendFailures: outbound.failed,
      peers: this.directory.size,
      liveUsers: this.presence.list().length,
    };
  }

  private reportError(err: unknown): void {
    const error = err instanceof Error ? err : new Error(errorMessage(err));
    this.logger?.debug(`Error: ${error.message}`);
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
