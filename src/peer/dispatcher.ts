import { EventEmitter } from 'node:events';
import type { HistoryLog } from '../history.js';
import {
  senderOf,
  type ActiveMessage,
  type ChatMessage,
  type JoinMessage,
  type LeaveMessage,
  type Message,
  type PingMessage,
  type PrivateMessage,
  type RenameMessage,
} from '../protocol/messages.js';
import type { PeerDirectory } from '../registry/peer-directory.js';
import type { PresenceRegistry } from '../registry/presence.js';
import { errorMessage, type Logger } from '../utils.js';
import type { Broadcaster } from './broadcaster.js';
import type { LocalIdentity } from './types.js';

/**
 * Events emitted by Dispatcher
 */
export interface DispatcherEvents {
  'chat': (message: ChatMessage) => void;
  'private': (message: PrivateMessage) => void;
  'peer-joined': (name: string, address: string) => void;
  'peer-left': (name: string, address: string) => void;
  'peer-renamed': (oldName: string, newName: string, address: string) => void;
  'error': (error: Error) => void;
}

export interface DispatcherOptions {
  identity: LocalIdentity;
  directory: PeerDirectory;
  presence: PresenceRegistry;
  broadcaster: Broadcaster;
  history?: HistoryLog;
  /**
   * Port assumed for peers learned without one (join, active, private).
   * A guess that every peer listens on the same port; defaults to ours.
   */
  discoveryPort?: number;
  logger?: Logger;
}

/**
 * Applies one decoded inbound message to the directory and presence
 * registry, replies where the protocol asks for it, and emits what the
 * front end should show.
 */
export class Dispatcher extends EventEmitter {
  private identity: LocalIdentity;
  private directory: PeerDirectory;
  private presence: PresenceRegistry;
  private broadcaster: Broadcaster;
  private history: HistoryLog | null;
  private discoveryPort: number | undefined;
  private logger: Logger | null;

  constructor(options: DispatcherOptions) {
    super();
    this.identity = options.identity;
    this.directory = options.directory;
    this.presence = options.presence;
    this.broadcaster = options.broadcaster;
    this.history = options.history ?? null;
    this.discoveryPort = options.discoveryPort;
    this.logger = options.logger ?? null;
  }

  async dispatch(message: Message): Promise<void> {
    if (message.kind === 'rename') {
      this.handleRename(message);
      return;
    }

    const sender = senderOf(message);
    this.presence.touch(sender.name, sender.address);

    switch (message.kind) {
      case 'chat':
        await this.handleChat(message);
        break;
      case 'join':
        await this.handleJoin(message);
        break;
      case 'leave':
        this.handleLeave(message);
        break;
      case 'ping':
        await this.handlePing(message);
        break;
      case 'active':
        await this.handleActive(message);
        break;
      case 'private':
        await this.handlePrivate(message);
        break;
    }
  }

  private async handleChat(message: ChatMessage): Promise<void> {
    this.emit('chat', message);
    await this.record(`${message.sender}: ${message.text}`);
  }

  private async handleJoin(message: JoinMessage): Promise<void> {
    this.emit('peer-joined', message.name, message.address);
    await this.discover(message.address);
    await this.replyActive(message.address);
  }

  private handleLeave(message: LeaveMessage): void {
    this.emit('peer-left', message.name, message.address);
    // The peer record stays so the user can still reach that address
    this.presence.remove(message.name, message.address);
  }

  private async handlePing(message: PingMessage): Promise<void> {
    if (message.replyPort !== undefined) {
      try {
        await this.directory.upsert(message.address, message.replyPort);
      } catch (err) {
        this.reportError(err);
      }
    } else {
      await this.discover(message.address);
    }
    await this.replyActive(message.address);
  }

  private async handleActive(message: ActiveMessage): Promise<void> {
    await this.discover(message.address);
  }

  private handleRename(message: RenameMessage): void {
    this.emit('peer-renamed', message.oldName, message.newName, message.address);
    this.presence.rename(message.oldName, message.newName, message.address);
  }

  private async handlePrivate(message: PrivateMessage): Promise<void> {
    if (message.targetName !== this.identity.name) {
      this.logger?.debug(`Dropping private message for ${message.targetName}`);
      return;
    }
    this.emit('private', message);
    await this.record(`[Private from ${message.sender}] ${message.text}`);
    await this.discover(message.address);
  }

  /**
   * Add an address under the discovery port if it is not known yet.
   */
  private async discover(address: string): Promise<void> {
    if (this.directory.has(address)) {
      return;
    }
    const port = this.discoveryPort ?? this.identity.port;
    this.logger?.debug(`Discovered peer ${address}, assuming port ${port}`);
    try {
      await this.directory.upsert(address, port);
    } catch (err) {
      this.reportError(err);
    }
  }

  private async replyActive(address: string): Promise<void> {
    const peer = this.directory.get(address);
    if (!peer) {
      return;
    }
    const reply: ActiveMessage = {
      kind: 'active',
      name: this.identity.name,
      address: this.identity.address,
    };
    await this.broadcaster.sendTo(reply, peer.address, peer.port);
  }

  private async record(entry: string): Promise<void> {
    if (!this.history) {
      return;
    }
    try {
      await this.history.append(entry);
    } catch (err) {
      this.reportError(err);
    }
  }

  private reportError(err: unknown): void {
    const error = err instanceof Error ? err : new Error(errorMessage(err));
    this.logger?.debug(`Dispatch error: ${error.message}`);
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
