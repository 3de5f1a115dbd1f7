import { readFileSync, existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { homedir, userInfo } from 'node:os';
import { isValidAddress, isValidFieldValue, isValidPort } from './protocol/codec.js';
import { DEFAULT_PRESENCE_TTL_MS } from './registry/presence.js';
import { DEFAULT_KEEPALIVE_MS } from './peer/keepalive.js';
import { DEFAULT_PROBE_TIMEOUT_MS } from './peer/probe.js';
import { DEFAULT_SEND_TIMEOUT_MS } from './transport/udp.js';

export const DEFAULT_PORT = 12345;

/**
 * Canonical palaver configuration shape.
 * Use loadPalaverConfig() to load from file with defaults applied.
 */
export interface PalaverConfig {
  /** Display name */
  name: string;
  /** Listening UDP port */
  port: number;
  /** Address advertised to peers; guessed from the interfaces when unset */
  address?: string;
  /** Port assumed for peers learned without one; the listening port when unset */
  discoveryPort?: number;
  peersFile: string;
  historyFile: string;
  ttlMs: number;
  keepaliveMs: number;
  sendTimeoutMs: number;
  probeTimeoutMs: number;
  /** Local status API port; disabled when unset */
  statusPort?: number;
}

/**
 * Default config file path: PALAVER_CONFIG env or ~/.config/palaver/config.json
 */
export function getDefaultConfigPath(): string {
  if (process.env.PALAVER_CONFIG) {
    return resolve(process.env.PALAVER_CONFIG);
  }
  return resolve(homedir(), '.config', 'palaver', 'config.json');
}

function defaultName(): string {
  try {
    const username = userInfo().username;
    if (isValidFieldValue(username)) {
      return username;
    }
  } catch {
    // No passwd entry for this uid
  }
  return 'anonymous';
}

export function defaultConfig(): PalaverConfig {
  return {
    name: defaultName(),
    port: DEFAULT_PORT,
    peersFile: resolve(homedir(), '.chat_peers'),
    historyFile: resolve(homedir(), '.chat_history'),
    ttlMs: DEFAULT_PRESENCE_TTL_MS,
    keepaliveMs: DEFAULT_KEEPALIVE_MS,
    sendTimeoutMs: DEFAULT_SEND_TIMEOUT_MS,
    probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
  };
}

function readPort(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !isValidPort(value)) {
    throw new Error(`Invalid config: ${key} must be a port number between 1 and 65535`);
  }
  return value;
}

function readDuration(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid config: ${key} must be a positive number of milliseconds`);
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Invalid config: ${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Normalize a parsed config object on top of the defaults (shared by sync
 * and async loaders).
 */
export function parseConfig(raw: Record<string, unknown>, base: PalaverConfig = defaultConfig()): PalaverConfig {
  const name = readString(raw, 'name');
  if (name !== undefined && !isValidFieldValue(name)) {
    throw new Error("Invalid config: name must not contain ':'");
  }
  const address = readString(raw, 'address');
  if (address !== undefined && !isValidAddress(address)) {
    throw new Error("Invalid config: address must not contain ':' or whitespace");
  }
  const peersFile = readString(raw, 'peersFile');
  const historyFile = readString(raw, 'historyFile');

  return {
    name: name ?? base.name,
    port: readPort(raw, 'port') ?? base.port,
    address: address ?? base.address,
    discoveryPort: readPort(raw, 'discoveryPort') ?? base.discoveryPort,
    peersFile: peersFile ? resolve(peersFile) : base.peersFile,
    historyFile: historyFile ? resolve(historyFile) : base.historyFile,
    ttlMs: readDuration(raw, 'ttlMs') ?? base.ttlMs,
    keepaliveMs: readDuration(raw, 'keepaliveMs') ?? base.keepaliveMs,
    sendTimeoutMs: readDuration(raw, 'sendTimeoutMs') ?? base.sendTimeoutMs,
    probeTimeoutMs: readDuration(raw, 'probeTimeoutMs') ?? base.probeTimeoutMs,
    statusPort: readPort(raw, 'statusPort') ?? base.statusPort,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(content: string, configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load palaver configuration from a JSON file (sync). A missing file means
 * all defaults.
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws Error if the file holds invalid JSON or invalid values
 */
export function loadPalaverConfig(path?: string): PalaverConfig {
  const configPath = path ?? getDefaultConfigPath();

  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  const content = readFileSync(configPath, 'utf-8');
  return parseConfig(parseJson(content, configPath));
}

/**
 * Load palaver configuration from a JSON file (async).
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws Error if the file holds invalid JSON or invalid values
 */
export async function loadPalaverConfigAsync(path?: string): Promise<PalaverConfig> {
  const configPath = path ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const code = err && typeof err === 'object' && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      return defaultConfig();
    }
    throw err;
  }

  return parseConfig(parseJson(content, configPath));
}
