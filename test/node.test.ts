import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { MemoryHistory } from '../src/history.js';
import { ChatNode } from '../src/node.js';
import type { ChatMessage, PrivateMessage } from '../src/protocol/messages.js';
import { MemoryPeerStorage } from './helpers/fakes.js';
import { MemoryNetwork } from './helpers/memory-network.js';

function createNode(
  network: MemoryNetwork,
  name: string,
  address: string,
  options: { port?: number; storage?: MemoryPeerStorage } = {}
) {
  const history = new MemoryHistory();
  const storage = options.storage ?? new MemoryPeerStorage();
  const node = new ChatNode(
    { name, address, port: options.port ?? 9, probeTimeoutMs: 200 },
    { transport: network.transport(address), storage, history }
  );
  return { node, history, storage };
}

describe('ChatNode between two peers', () => {
  const network = new MemoryNetwork();
  const alice = createNode(network, 'alice', '10.0.0.1');
  const bob = createNode(network, 'bob', '10.0.0.2');
  const nodes = [alice.node, bob.node];

  const bobJoins: string[] = [];
  const bobChats: ChatMessage[] = [];
  const aliceWhispers: PrivateMessage[] = [];
  const bobLeaves: string[] = [];

  before(async () => {
    bob.node.on('peer-joined', (name: string, address: string) => bobJoins.push(`${name}@${address}`));
    bob.node.on('chat', (message: ChatMessage) => bobChats.push(message));
    bob.node.on('peer-left', (name: string) => bobLeaves.push(name));
    alice.node.on('private', (message: PrivateMessage) => aliceWhispers.push(message));
    await alice.node.start();
    await bob.node.start();
  });

  after(async () => {
    await Promise.all(nodes.map(node => node.shutdown()));
  });

  it('should connect and learn each other', async () => {
    const result = await alice.node.handleCommand('/connect', ['10.0.0.2:9']);
    await network.settle(nodes);

    assert.deepStrictEqual(result, { ok: true, lines: ['Connected to 10.0.0.2:9'] });
    assert.deepStrictEqual(alice.node.directory.list(), [{ address: '10.0.0.2', port: 9 }]);
    assert.deepStrictEqual(bob.node.directory.list(), [{ address: '10.0.0.1', port: 9 }]);
    assert.strictEqual(alice.node.presence.isLive('bob', '10.0.0.2'), true);
    assert.strictEqual(bob.node.presence.isLive('alice', '10.0.0.1'), true);
    assert.deepStrictEqual(bobJoins, ['alice@10.0.0.1']);
    assert.deepStrictEqual(alice.storage.records, [{ address: '10.0.0.2', port: 9 }]);
  });

  it('should deliver public chat lines', async () => {
    await alice.node.sendChat('hello: world');
    await network.settle(nodes);

    assert.deepStrictEqual(bobChats, [{ kind: 'chat', sender: 'alice', address: '10.0.0.1', text: 'hello: world' }]);
    assert.deepStrictEqual(await bob.history.tail(10), ['alice: hello: world']);
    assert.deepStrictEqual(await alice.history.tail(10), ['alice: hello: world']);
  });

  it('should deliver whispers by name', async () => {
    const result = await bob.node.handleCommand('whisper', ['alice', 'psst']);
    await network.settle(nodes);

    assert.deepStrictEqual(result, { ok: true, lines: ['[Private to alice] psst'] });
    assert.deepStrictEqual(aliceWhispers, [
      { kind: 'private', sender: 'bob', address: '10.0.0.2', targetName: 'alice', text: 'psst' },
    ]);
    assert.deepStrictEqual(await alice.history.tail(1), ['[Private from bob] psst']);
  });

  it('should spread a rename', async () => {
    await alice.node.handleCommand('name', ['alicia']);
    await network.settle(nodes);

    assert.strictEqual(bob.node.presence.resolveAddress('alicia'), '10.0.0.1');
    assert.strictEqual(bob.node.presence.resolveAddress('alice'), undefined);
  });

  it('should announce a shutdown', async () => {
    await alice.node.shutdown();
    await network.settle(nodes);

    assert.deepStrictEqual(bobLeaves, ['alicia']);
    assert.strictEqual(bob.node.presence.resolveAddress('alicia'), undefined);
    assert.strictEqual(bob.node.directory.has('10.0.0.1'), true);
    assert.strictEqual(alice.node.isRunning(), false);
  });
});

describe('ChatNode lifecycle', () => {
  it('should fail to start on a port that is taken', async () => {
    const network = new MemoryNetwork();
    const first = createNode(network, 'bob', '10.0.0.2');
    const second = createNode(network, 'carol', '10.0.0.2');
    await first.node.start();

    try {
      await assert.rejects(second.node.start(), /EADDRINUSE/);
      assert.strictEqual(second.node.isRunning(), false);
    } finally {
      await first.node.shutdown();
    }
  });

  it('should adopt the port picked for port 0', async () => {
    const network = new MemoryNetwork();
    const { node } = createNode(network, 'alice', '10.0.0.1', { port: 0 });

    await node.start();
    try {
      assert.strictEqual(node.identity.port, 40000);
      assert.strictEqual(node.presence.isLive('alice', '10.0.0.1'), true);
    } finally {
      await node.shutdown();
    }
  });

  it('should announce itself to stored peers on start', async () => {
    const network = new MemoryNetwork();
    const bob = createNode(network, 'bob', '10.0.0.2');
    const alice = createNode(network, 'alice', '10.0.0.1', {
      storage: new MemoryPeerStorage([{ address: '10.0.0.2', port: 9 }]),
    });
    const joins: string[] = [];
    bob.node.on('peer-joined', (name: string) => joins.push(name));

    await bob.node.start();
    await alice.node.start();
    await network.settle([alice.node, bob.node]);

    try {
      assert.deepStrictEqual(joins, ['alice']);
      assert.strictEqual(alice.node.presence.isLive('bob', '10.0.0.2'), true);
      assert.deepStrictEqual(await alice.node.tick(), { sent: 1, failed: 0 });
    } finally {
      await Promise.all([alice.node.shutdown(), bob.node.shutdown()]);
    }
  });

  it('should count and report malformed datagrams', async () => {
    const network = new MemoryNetwork();
    const { node } = createNode(network, 'alice', '10.0.0.1');
    const reasons: string[] = [];
    node.on('malformed', (reason: string) => reasons.push(reason));

    await node.start();
    try {
      await node.handleInbound('NOPE:x\n', { address: '10.0.0.8', port: 9 });

      assert.deepStrictEqual(reasons, ['unknown_tag']);
      const stats = node.getStats();
      assert.strictEqual(stats.received, 1);
      assert.strictEqual(stats.malformed, 1);
      assert.strictEqual(stats.dispatched, 0);
      assert.strictEqual(stats.liveUsers, 1);
    } finally {
      await node.shutdown();
    }
  });

  it('should refuse a second start and shut down only once', async () => {
    const network = new MemoryNetwork();
    const bob = createNode(network, 'bob', '10.0.0.2');
    const alice = createNode(network, 'alice', '10.0.0.1', {
      storage: new MemoryPeerStorage([{ address: '10.0.0.2', port: 9 }]),
    });
    const leaves: string[] = [];
    bob.node.on('peer-left', (name: string) => leaves.push(name));
    await bob.node.start();
    await alice.node.start();

    await assert.rejects(alice.node.start(), { message: 'Node already started' });
    await alice.node.shutdown();
    await alice.node.shutdown();
    await network.settle([bob.node]);

    assert.deepStrictEqual(leaves, ['alice']);
    await bob.node.shutdown();
  });
});
