import type { HistoryLog } from '../history.js';
import { isValidFieldValue } from '../protocol/codec.js';
import type { JoinMessage, PingMessage, PrivateMessage, RenameMessage } from '../protocol/messages.js';
import type { PeerDirectory } from '../registry/peer-directory.js';
import type { PresenceRegistry } from '../registry/presence.js';
import { errorMessage, parseHostPort, type Logger } from '../utils.js';
import type { Broadcaster } from './broadcaster.js';
import { DEFAULT_PROBE_TIMEOUT_MS, type ProbeTracker } from './probe.js';
import type { LocalIdentity } from './types.js';

/** Lines shown by `history` */
export const HISTORY_LINES = 50;

/**
 * What the front end should do after showing the result
 */
export type CommandAction = 'clear' | 'quit';

export type CommandResult =
  | { ok: true; lines: string[]; action?: CommandAction }
  | { ok: false; error: string };

export const COMMAND_HELP: ReadonlyArray<readonly [string, string]> = [
  ['/quit', 'Leave the chat'],
  ['/users', 'List active users'],
  ['/name NAME', 'Change your display name'],
  ['/history', 'Show recent messages'],
  ['/clear', 'Clear the screen'],
  ['/whisper NAME MESSAGE', 'Send a private message'],
  ['/connect ADDRESS:PORT', 'Connect to a remote peer'],
  ['/disconnect ADDRESS', 'Forget a remote peer'],
  ['/peers', 'List known peers'],
  ['/help', 'Show this list'],
];

export interface CommandExecutorOptions {
  identity: LocalIdentity;
  directory: PeerDirectory;
  presence: PresenceRegistry;
  broadcaster: Broadcaster;
  probes: ProbeTracker;
  history?: HistoryLog;
  probeTimeoutMs?: number;
  logger?: Logger;
}

function ok(lines: string[], action?: CommandAction): CommandResult {
  return action ? { ok: true, lines, action } : { ok: true, lines };
}

function fail(error: string): CommandResult {
  return { ok: false, error };
}

/**
 * Turns local slash commands into directory/presence changes and sends.
 */
export class CommandExecutor {
  private identity: LocalIdentity;
  private directory: PeerDirectory;
  private presence: PresenceRegistry;
  private broadcaster: Broadcaster;
  private probes: ProbeTracker;
  private history: HistoryLog | null;
  private probeTimeoutMs: number;
  private logger: Logger | null;

  constructor(options: CommandExecutorOptions) {
    this.identity = options.identity;
    this.directory = options.directory;
    this.presence = options.presence;
    this.broadcaster = options.broadcaster;
    this.probes = options.probes;
    this.history = options.history ?? null;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.logger = options.logger ?? null;
  }

  /**
   * Run a command by name (with or without the leading slash).
   */
  async execute(name: string, args: string[]): Promise<CommandResult> {
    const command = name.startsWith('/') ? name.slice(1) : name;

    switch (command) {
      case 'quit':
        return ok([], 'quit');
      case 'clear':
        return ok([], 'clear');
      case 'help':
        return ok(COMMAND_HELP.map(([usage, description]) => `${usage} - ${description}`));
      case 'users':
        return this.listUsers();
      case 'peers':
        return this.listPeers();
      case 'history':
        return this.showHistory();
      case 'name':
        return this.rename(args);
      case 'whisper':
        return this.whisper(args);
      case 'connect':
        return this.connect(args);
      case 'disconnect':
        return this.disconnect(args);
      default:
        return fail(`Unknown command: ${name}. Type /help for the list of commands`);
    }
  }

  /**
   * Probe an endpoint and, if anything answers in time, add it and announce
   * ourselves to the whole directory.
   */
  async connect(args: string[]): Promise<CommandResult> {
    const target = args.length === 1 ? parseHostPort(args[0]) : undefined;
    if (!target) {
      return fail('Usage: /connect ADDRESS:PORT');
    }
    const { address, port } = target;

    if (this.directory.get(address)?.port === port) {
      return ok([`Already connected to ${address}:${port}`]);
    }

    const reply = this.probes.wait(address, this.probeTimeoutMs);
    const probe: PingMessage = {
      kind: 'ping',
      name: this.identity.name,
      address: this.identity.address,
      replyPort: this.identity.port,
    };
    const sent = await this.broadcaster.sendTo(probe, address, port);
    if (!sent.ok) {
      this.logger?.debug(`Probe to ${address}:${port} not sent: ${sent.error}`);
    }

    if (!(await reply)) {
      return fail(`Could not connect to ${address}:${port}`);
    }

    let persistError: string | undefined;
    try {
      await this.directory.upsert(address, port);
    } catch (err) {
      persistError = errorMessage(err);
    }

    const join: JoinMessage = { kind: 'join', name: this.identity.name, address: this.identity.address };
    await this.broadcaster.broadcast(join);

    if (persistError) {
      return fail(`Connected to ${address}:${port}, but the peer was not saved: ${persistError}`);
    }
    return ok([`Connected to ${address}:${port}`]);
  }

  /**
   * Forget a peer and every presence entry at its address.
   */
  async disconnect(args: string[]): Promise<CommandResult> {
    const address = args[0];
    if (args.length !== 1 || !address) {
      return fail('Usage: /disconnect ADDRESS');
    }
    if (!this.directory.has(address)) {
      return fail(`Peer ${address} not found`);
    }

    const removal = this.directory.remove(address);
    this.presence.removeByAddress(address);
    try {
      await removal;
    } catch (err) {
      return fail(`Peer ${address} removed, but the peer file was not updated: ${errorMessage(err)}`);
    }
    return ok([`Peer ${address} removed`]);
  }

  async rename(args: string[]): Promise<CommandResult> {
    const newName = args[0];
    if (args.length !== 1 || !newName || !isValidFieldValue(newName)) {
      return fail("Usage: /name NAME (a single word without ':')");
    }

    const oldName = this.identity.name;
    if (newName === oldName) {
      return ok([`You are already named ${newName}`]);
    }

    this.identity.name = newName;
    this.presence.rename(oldName, newName, this.identity.address);

    const rename: RenameMessage = {
      kind: 'rename',
      oldName,
      newName,
      address: this.identity.address,
    };
    await this.broadcaster.broadcast(rename);
    return ok([`Your name changed from ${oldName} to ${newName}`]);
  }

  /**
   * List live users, then ping everyone so the next listing is fresher.
   */
  async listUsers(): Promise<CommandResult> {
    this.presence.touch(this.identity.name, this.identity.address);

    const lines = this.presence.list().map(entry => {
      const self = entry.name === this.identity.name && entry.address === this.identity.address;
      return `${entry.name}${self ? ' (you)' : ''} @ ${entry.address}`;
    });

    const ping: PingMessage = {
      kind: 'ping',
      name: this.identity.name,
      address: this.identity.address,
      replyPort: this.identity.port,
    };
    await this.broadcaster.broadcast(ping);
    return ok(lines);
  }

  listPeers(): CommandResult {
    const peers = this.directory.list();
    if (peers.length === 0) {
      return ok(['No peers connected']);
    }
    return ok(peers.map(peer => `${peer.address}:${peer.port}`));
  }

  async whisper(args: string[]): Promise<CommandResult> {
    const [targetName, ...words] = args;
    const text = words.join(' ');
    if (!targetName || text.trim() === '') {
      return fail('Usage: /whisper NAME MESSAGE');
    }

    const address = this.presence.resolveAddress(targetName);
    if (!address) {
      return fail(`User not found: ${targetName}`);
    }
    const peer = this.directory.get(address);
    if (!peer) {
      return fail(`No known port for ${targetName} @ ${address}`);
    }

    const message: PrivateMessage = {
      kind: 'private',
      sender: this.identity.name,
      address: this.identity.address,
      targetName,
      text,
    };
    const sent = await this.broadcaster.sendTo(message, peer.address, peer.port);
    if (!sent.ok) {
      return fail(`Private message to ${targetName} not sent: ${sent.error}`);
    }

    const entry = `[Private to ${targetName}] ${text}`;
    try {
      await this.history?.append(entry);
    } catch (err) {
      this.logger?.debug(`History append failed: ${errorMessage(err)}`);
    }
    return ok([entry]);
  }

  async showHistory(): Promise<CommandResult> {
    if (!this.history) {
      return ok([]);
    }
    try {
      return ok(await this.history.tail(HISTORY_LINES));
    } catch (err) {
      return fail(`Could not read history: ${errorMessage(err)}`);
    }
  }
}
