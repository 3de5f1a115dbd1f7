#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { createInterface } from 'node:readline';
import type http from 'node:http';
import { loadPalaverConfigAsync, getDefaultConfigPath, type PalaverConfig } from './config.js';
import { HistoryFile } from './history.js';
import { ChatNode } from './node.js';
import { isValidAddress, isValidFieldValue, isValidPort } from './protocol/codec.js';
import type { ChatMessage, PrivateMessage } from './protocol/messages.js';
import { PeerFile } from './registry/peer-file.js';
import { startStatusServer } from './status/status-api.js';
import { UdpTransport } from './transport/udp.js';
import { errorMessage, guessLocalAddress, type Logger } from './utils.js';

const USAGE = `Usage: palaver [options]

Options:
  -h, --help              Show this help
  -p, --port NUM          Listening port (default: 12345)
  -n, --name NAME         Display name (default: login name)
  -a, --address ADDRESS   Address advertised to peers
      --config PATH       Config file (default: ${getDefaultConfigPath()})
      --status-port NUM   Serve the local status API on 127.0.0.1:NUM
  -v, --verbose           Debug output on stderr

Type /help once running for the list of commands.`;

/**
 * Debug logger writing timestamped lines to stderr.
 */
function createConsoleLogger(): Logger {
  return {
    debug(message: string): void {
      console.error(`[${new Date().toISOString()}] ${message}`);
    },
  };
}

function fatal(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function parsePortOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const port = parseInt(value, 10);
  if (!/^\d+$/.test(value) || !isValidPort(port)) {
    fatal(`Invalid ${flag} '${value}'. Port must be between 1 and 65535.`);
  }
  return port;
}

/**
 * Config file values, overridden by command-line flags.
 */
async function resolveConfig(): Promise<{ config: PalaverConfig; verbose: boolean }> {
  const parsed = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: 'boolean', short: 'h' },
      port: { type: 'string', short: 'p' },
      name: { type: 'string', short: 'n' },
      address: { type: 'string', short: 'a' },
      config: { type: 'string' },
      'status-port': { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
    },
    strict: true,
    allowPositionals: false,
  });

  if (parsed.values.help) {
    console.log(USAGE);
    process.exit(0);
  }

  const config = await loadPalaverConfigAsync(parsed.values.config);

  const name = parsed.values.name;
  if (name !== undefined) {
    if (!isValidFieldValue(name)) {
      fatal("Name must be non-empty and must not contain ':'");
    }
    config.name = name;
  }
  const address = parsed.values.address;
  if (address !== undefined) {
    if (!isValidAddress(address)) {
      fatal("Address must be non-empty and must not contain ':' or whitespace");
    }
    config.address = address;
  }
  config.port = parsePortOption(parsed.values.port, '--port') ?? config.port;
  config.statusPort = parsePortOption(parsed.values['status-port'], '--status-port') ?? config.statusPort;

  const verbose = parsed.values.verbose === true || process.env.PALAVER_DEBUG === '1';
  return { config, verbose };
}

async function main(): Promise<void> {
  let resolved: { config: PalaverConfig; verbose: boolean };
  try {
    resolved = await resolveConfig();
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    console.error(USAGE);
    process.exit(1);
  }
  const { config, verbose } = resolved;
  const logger = verbose ? createConsoleLogger() : undefined;

  const node = new ChatNode(
    {
      name: config.name,
      address: config.address ?? guessLocalAddress(),
      port: config.port,
      discoveryPort: config.discoveryPort,
      ttlMs: config.ttlMs,
      keepaliveMs: config.keepaliveMs,
      probeTimeoutMs: config.probeTimeoutMs,
    },
    {
      transport: new UdpTransport({ sendTimeoutMs: config.sendTimeoutMs }),
      storage: new PeerFile(config.peersFile),
      history: new HistoryFile(config.historyFile),
      logger,
    }
  );

  node.on('chat', (message: ChatMessage) => console.log(`${message.sender}: ${message.text}`));
  node.on('private', (message: PrivateMessage) => {
    console.log(`[Private from ${message.sender}@${message.address}] ${message.text}`);
  });
  node.on('peer-joined', (name: string, address: string) => console.log(`[System] ${name}@${address} joined the chat`));
  node.on('peer-left', (name: string, address: string) => console.log(`[System] ${name}@${address} left the chat`));
  node.on('peer-renamed', (oldName: string, newName: string, address: string) => {
    console.log(`[System] ${oldName}@${address} is now known as ${newName}`);
  });
  node.on('error', (error: Error) => console.error(`Error: ${error.message}`));

  try {
    await node.start();
  } catch (e) {
    fatal(`Cannot listen on port ${config.port}: ${errorMessage(e)}`);
  }

  let statusServer: http.Server | null = null;
  if (config.statusPort !== undefined) {
    try {
      statusServer = await startStatusServer(node, config.statusPort);
    } catch (e) {
      console.error(`Status API not started: ${errorMessage(e)}`);
    }
  }

  console.log(`Connected as: ${node.identity.name}`);
  console.log(`Local address: ${node.identity.address}`);
  console.log(`Listening port: ${node.identity.port}`);
  console.log('Type /help for commands, /connect ADDRESS:PORT to reach a peer');

  const rl = createInterface({ input: process.stdin, output: process.stdout });

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        console.log('\nClosing the chat...');
        rl.close();
        await node.shutdown();
        if (statusServer) {
          const server = statusServer;
          await new Promise<void>((resolve) => server.close(() => resolve()));
        }
      })();
    }
    return closing;
  };

  const exitAfterShutdown = (): void => {
    shutdown().then(
      () => process.exit(0),
      (e: unknown) => fatal(errorMessage(e))
    );
  };
  rl.on('SIGINT', exitAfterShutdown);
  process.on('SIGINT', exitAfterShutdown);
  process.on('SIGTERM', exitAfterShutdown);

  for await (const line of rl) {
    const input = line.trim();
    if (!input) {
      continue;
    }

    if (!input.startsWith('/')) {
      try {
        await node.sendChat(input);
      } catch (e) {
        console.error(`Error: ${errorMessage(e)}`);
      }
      continue;
    }

    const [command, ...args] = input.split(/\s+/);
    const result = await node.handleCommand(command, args);
    if (!result.ok) {
      console.error(result.error);
      continue;
    }
    for (const output of result.lines) {
      console.log(output);
    }
    if (result.action === 'clear') {
      console.clear();
    } else if (result.action === 'quit') {
      break;
    }
  }

  await shutdown();
  process.exit(0);
}

main().catch((e) => {
  console.error('Fatal error:', errorMessage(e));
  process.exit(1);
});
