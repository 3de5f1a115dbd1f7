import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  DEFAULT_PORT,
  defaultConfig,
  getDefaultConfigPath,
  loadPalaverConfig,
  loadPalaverConfigAsync,
  parseConfig,
  type PalaverConfig,
} from '../src/config.js';

const BASE: PalaverConfig = {
  name: 'alice',
  port: 4000,
  peersFile: '/var/palaver/peers',
  historyFile: '/var/palaver/history',
  ttlMs: 300_000,
  keepaliveMs: 60_000,
  sendTimeoutMs: 1000,
  probeTimeoutMs: 3000,
};

describe('parseConfig', () => {
  it('should return the base when nothing is set', () => {
    assert.deepStrictEqual(parseConfig({}, BASE), {
      ...BASE,
      address: undefined,
      discoveryPort: undefined,
      statusPort: undefined,
    });
  });

  it('should override the base with file values', () => {
    const config = parseConfig(
      { name: 'bob', port: 5000, address: '10.0.0.2', discoveryPort: 6000, ttlMs: 1000, statusPort: 8080 },
      BASE
    );
    assert.strictEqual(config.name, 'bob');
    assert.strictEqual(config.port, 5000);
    assert.strictEqual(config.address, '10.0.0.2');
    assert.strictEqual(config.discoveryPort, 6000);
    assert.strictEqual(config.ttlMs, 1000);
    assert.strictEqual(config.statusPort, 8080);
    assert.strictEqual(config.keepaliveMs, 60_000);
  });

  it('should resolve file paths', () => {
    const config = parseConfig({ peersFile: 'data/peers' }, BASE);
    assert.strictEqual(config.peersFile, resolve('data/peers'));
  });

  it('should reject invalid ports', () => {
    assert.throws(
      () => parseConfig({ port: 0 }, BASE),
      { message: 'Invalid config: port must be a port number between 1 and 65535' }
    );
    assert.throws(
      () => parseConfig({ statusPort: '8080' }, BASE),
      { message: 'Invalid config: statusPort must be a port number between 1 and 65535' }
    );
  });

  it('should reject a name containing the delimiter', () => {
    assert.throws(() => parseConfig({ name: 'al:ice' }, BASE), { message: "Invalid config: name must not contain ':'" });
  });

  it('should reject an address with whitespace', () => {
    assert.throws(
      () => parseConfig({ address: '10.0.0.1 4000' }, BASE),
      { message: "Invalid config: address must not contain ':' or whitespace" }
    );
  });

  it('should reject non-positive durations', () => {
    assert.throws(
      () => parseConfig({ ttlMs: -5 }, BASE),
      { message: 'Invalid config: ttlMs must be a positive number of milliseconds' }
    );
  });
});

describe('defaultConfig', () => {
  it('should listen on the default port', () => {
    const config = defaultConfig();
    assert.strictEqual(config.port, DEFAULT_PORT);
    assert.strictEqual(config.name.includes(':'), false);
  });
});

describe('getDefaultConfigPath', () => {
  let saved: string | undefined;

  beforeEach(() => {
    saved = process.env.PALAVER_CONFIG;
  });

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.PALAVER_CONFIG;
    } else {
      process.env.PALAVER_CONFIG = saved;
    }
  });

  it('should honour PALAVER_CONFIG', () => {
    process.env.PALAVER_CONFIG = 'custom/config.json';
    assert.strictEqual(getDefaultConfigPath(), resolve('custom/config.json'));
  });
});

describe('loadPalaverConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'palaver-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should use defaults when the file is missing', async () => {
    const path = join(dir, 'missing.json');
    assert.deepStrictEqual(loadPalaverConfig(path), defaultConfig());
    assert.deepStrictEqual(await loadPalaverConfigAsync(path), defaultConfig());
  });

  it('should read values from the file', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ name: 'carol', port: 4321 }));

    const sync = loadPalaverConfig(path);
    const fromAsync = await loadPalaverConfigAsync(path);
    assert.strictEqual(sync.name, 'carol');
    assert.strictEqual(sync.port, 4321);
    assert.deepStrictEqual(fromAsync, sync);
  });

  it('should reject invalid JSON', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, '{ not json');

    assert.throws(() => loadPalaverConfig(path), { message: `Invalid JSON in config file: ${path}` });
    await assert.rejects(loadPalaverConfigAsync(path), { message: `Invalid JSON in config file: ${path}` });
  });

  it('should reject JSON that is not an object', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, '[1, 2]');

    assert.throws(() => loadPalaverConfig(path), { message: `Invalid config: ${path} must contain a JSON object` });
  });
});
