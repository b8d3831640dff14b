import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { quietLogs, waitFor } from './helpers';
import { DevicePool } from '../pool/device-pool';
import { DeviceConnection, DeviceEndpoint, DeviceHealth, QueueCounters } from '../devices';
import { DeviceDirectory, InventoryDevice, QueueMappingStore } from '../inventory/types';
import { RouterOSEmulator } from '../emulators/routeros-emulator';

quietLogs();

type Behavior = 'ok' | 'throw' | 'hang' | 'empty';

function queue(name: string, rateRx = 100, rateTx = 200): QueueCounters {
  return { name, target: '', rateRx, rateTx, bytesRx: 0, bytesTx: 0, packetsRx: 0, packetsTx: 0 };
}

class FakeConnection implements DeviceConnection {
  readonly deviceId: string;
  readonly vendor: string;
  readonly endpoint: DeviceEndpoint;
  behavior: Behavior;
  retry = true;
  fetches = 0;
  disconnects = 0;

  constructor(endpoint: DeviceEndpoint, behavior: Behavior) {
    this.endpoint = endpoint;
    this.deviceId = endpoint.deviceId;
    this.vendor = endpoint.vendor;
    this.behavior = behavior;
  }

  async connect(): Promise<boolean> {
    return true;
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
  }

  fetchCounters(): Promise<QueueCounters[]> {
    this.fetches++;
    switch (this.behavior) {
      case 'throw':
        return Promise.reject(new Error('socket exploded'));
      case 'hang':
        return new Promise<QueueCounters[]>(() => undefined);
      case 'empty':
        return Promise.resolve([]);
      default:
        return Promise.resolve([queue(`${this.deviceId}-q1`), queue(`${this.deviceId}-q2`)]);
    }
  }

  shouldRetry(): boolean {
    return this.retry;
  }

  isConnected(): boolean {
    return true;
  }

  getHealth(): DeviceHealth {
    return {
      deviceId: this.deviceId,
      vendor: this.vendor,
      host: this.endpoint.host,
      port: this.endpoint.port,
      state: 'connected',
      consecutiveFailures: 0,
      lastSuccessAt: null,
      lastAttemptAt: null,
      lastError: null,
    };
  }
}

class FakeDirectory implements DeviceDirectory, QueueMappingStore {
  devices: InventoryDevice[] = [];
  mappings: Map<string, Map<string, string>> = new Map();
  failList = false;
  failMappingFor: Set<string> = new Set();
  listCalls = 0;
  vendors: string[] = [];

  async listActiveDevices(vendor: string): Promise<InventoryDevice[]> {
    this.listCalls++;
    this.vendors.push(vendor);
    if (this.failList) throw new Error('directory down');
    return this.devices;
  }

  async getDeviceMapping(deviceId: string): Promise<Map<string, string>> {
    if (this.failMappingFor.has(deviceId)) throw new Error('mapping store down');
    return this.mappings.get(deviceId) ?? new Map();
  }
}

function device(id: string, overrides: Partial<InventoryDevice> = {}): InventoryDevice {
  return {
    id,
    vendor: 'mikrotik',
    host: `10.0.0.${id.length}`,
    port: 8728,
    username: 'poller',
    password: 'test-secret',
    active: true,
    ...overrides,
  };
}

describe('DevicePool', () => {
  let directory: FakeDirectory;
  let behaviors: Map<string, Behavior>;
  let created: FakeConnection[];
  let clock: number;

  function makePool(timeoutMs = 1000): DevicePool {
    return new DevicePool(
      {
        directory,
        mappings: directory,
        connectionFactory: (endpoint) => {
          const conn = new FakeConnection(endpoint, behaviors.get(endpoint.deviceId) ?? 'ok');
          created.push(conn);
          return conn;
        },
        now: () => clock,
      },
      {
        vendor: 'mikrotik',
        refreshIntervalMs: 60000,
        connection: { timeoutMs, backoff: { baseMs: 1000, maxMs: 60000 } },
      },
    );
  }

  function fake(pool: DevicePool, deviceId: string): FakeConnection {
    const conn = pool.getConnection(deviceId);
    assert.ok(conn instanceof FakeConnection, `no connection for ${deviceId}`);
    return conn;
  }

  beforeEach(() => {
    directory = new FakeDirectory();
    behaviors = new Map();
    created = [];
    clock = 1_700_000_000_000;
  });

  describe('refresh', () => {
    it('creates a connection per active device', async () => {
      directory.devices = [device('nas-1'), device('nas-2')];
      const pool = makePool();

      const summary = await pool.refresh();

      assert.deepEqual(summary, { added: ['nas-1', 'nas-2'], removed: [], replaced: [], total: 2 });
      assert.deepEqual(pool.getDeviceIds(), ['nas-1', 'nas-2']);
      assert.deepEqual(directory.vendors, ['mikrotik']);
    });

    it('adds, removes, keeps and replaces on the next refresh', async () => {
      directory.devices = [device('keep'), device('gone'), device('moved')];
      const pool = makePool();
      await pool.refresh();
      const kept = fake(pool, 'keep');
      const gone = fake(pool, 'gone');
      const moved = fake(pool, 'moved');

      directory.devices = [device('keep'), device('moved', { host: '192.168.1.1' }), device('new')];
      const summary = await pool.refresh();

      assert.deepEqual(summary, { added: ['new'], removed: ['gone'], replaced: ['moved'], total: 3 });
      assert.equal(fake(pool, 'keep'), kept);
      assert.notEqual(fake(pool, 'moved'), moved);
      assert.equal(fake(pool, 'moved').endpoint.host, '192.168.1.1');
      assert.equal(kept.disconnects, 0);
      assert.equal(gone.disconnects, 1);
      assert.equal(moved.disconnects, 1);
      assert.equal(pool.getConnection('gone'), undefined);
    });

    it('replaces a connection whose credentials changed', async () => {
      directory.devices = [device('nas-1')];
      const pool = makePool();
      await pool.refresh();

      directory.devices = [device('nas-1', { password: 'rotated-secret' })];
      const summary = await pool.refresh();

      assert.deepEqual(summary?.replaced, ['nas-1']);
      assert.equal(created.length, 2);
    });

    it('skips devices without credentials, inactive devices and duplicate ids', async () => {
      directory.devices = [
        device('nas-1'),
        device('nas-2', { password: undefined }),
        device('nas-3', { active: false }),
        device('nas-1', { host: '10.9.9.9' }),
      ];
      const pool = makePool();
      await pool.refresh();

      assert.deepEqual(pool.getDeviceIds(), ['nas-1']);
      assert.equal(fake(pool, 'nas-1').endpoint.host, '10.0.0.5');
    });

    it('keeps the current set when the directory fails', async () => {
      directory.devices = [device('nas-1')];
      const pool = makePool();
      await pool.refresh();

      directory.failList = true;
      const summary = await pool.refresh();

      assert.equal(summary, null);
      assert.deepEqual(pool.getDeviceIds(), ['nas-1']);
      assert.equal(fake(pool, 'nas-1').disconnects, 0);
    });

    it('swaps in a new mapping snapshot', async () => {
      directory.devices = [device('nas-1')];
      directory.mappings.set('nas-1', new Map([['pppoe-alice', 'S1']]));
      const pool = makePool();
      await pool.refresh();
      assert.equal(pool.resolveSubscription('nas-1', 'pppoe-alice'), 'S1');

      directory.mappings.set('nas-1', new Map([['pppoe-bob', 'S2']]));
      await pool.refresh();

      assert.equal(pool.resolveSubscription('nas-1', 'pppoe-alice'), undefined);
      assert.equal(pool.resolveSubscription('nas-1', 'pppoe-bob'), 'S2');
    });

    it('keeps the previous mapping of a device whose mapping failed to load', async () => {
      directory.devices = [device('nas-1'), device('nas-2')];
      directory.mappings.set('nas-1', new Map([['q', 'S1']]));
      directory.mappings.set('nas-2', new Map([['q', 'S2']]));
      const pool = makePool();
      await pool.refresh();

      directory.failMappingFor.add('nas-1');
      directory.mappings.set('nas-2', new Map([['q', 'S3']]));
      await pool.refresh();

      assert.equal(pool.resolveSubscription('nas-1', 'q'), 'S1');
      assert.equal(pool.resolveSubscription('nas-2', 'q'), 'S3');
    });

    it('shares one run between overlapping refresh() calls', async () => {
      directory.devices = [device('nas-1')];
      const pool = makePool();

      const [a, b] = await Promise.all([pool.refresh(), pool.refresh()]);

      assert.equal(a, b);
      assert.equal(directory.listCalls, 1);
    });
  });

  describe('resolveSubscription', () => {
    it('returns undefined for unknown devices and queues', async () => {
      directory.devices = [device('nas-1')];
      directory.mappings.set('nas-1', new Map([['pppoe-alice', 'S1']]));
      const pool = makePool();
      await pool.refresh();

      assert.equal(pool.resolveSubscription('nas-1', 'pppoe-carol'), undefined);
      assert.equal(pool.resolveSubscription('nas-9', 'pppoe-alice'), undefined);
    });
  });

  describe('pollAll', () => {
    it('refreshes lazily on the refresh interval', async () => {
      directory.devices = [device('nas-1')];
      const pool = makePool();

      await pool.pollAll();
      assert.equal(directory.listCalls, 1);

      clock += 59_999;
      await pool.pollAll();
      assert.equal(directory.listCalls, 1);

      clock += 1;
      await pool.pollAll();
      assert.equal(directory.listCalls, 2);
    });

    it('waits a full interval after a failed refresh', async () => {
      directory.failList = true;
      const pool = makePool();

      await pool.pollAll();
      await pool.pollAll();
      assert.equal(directory.listCalls, 1);

      clock += 60_000;
      directory.failList = false;
      directory.devices = [device('nas-1')];
      await pool.pollAll();
      assert.equal(directory.listCalls, 2);
      assert.equal(pool.size, 1);
    });

    it('isolates failing and hanging devices', async () => {
      directory.devices = [device('good'), device('bad'), device('stuck'), device('idle')];
      behaviors.set('bad', 'throw');
      behaviors.set('stuck', 'hang');
      behaviors.set('idle', 'empty');
      const pool = makePool(50);

      const started = Date.now();
      const results = await pool.pollAll();
      const elapsed = Date.now() - started;

      assert.deepEqual(results.map((r) => r.deviceId), ['good']);
      assert.deepEqual(results[0].counters.map((c) => c.name), ['good-q1', 'good-q2']);
      assert.ok(elapsed < 1000, `pollAll took ${elapsed}ms`);
    });

    it('does not start a second fetch while one is still running', async () => {
      directory.devices = [device('stuck')];
      behaviors.set('stuck', 'hang');
      const pool = makePool(50);

      const [first, second] = await Promise.all([pool.pollAll(), pool.pollAll()]);
      const stuck = fake(pool, 'stuck');

      assert.deepEqual(first, []);
      assert.deepEqual(second, []);
      assert.equal(stuck.fetches, 1);
      assert.equal(stuck.disconnects, 1);

      await pool.pollAll();
      assert.equal(stuck.fetches, 1);
      assert.equal(stuck.disconnects, 1);
    });

    it('skips devices still in backoff', async () => {
      directory.devices = [device('nas-1'), device('nas-2')];
      const pool = makePool();
      await pool.refresh();
      fake(pool, 'nas-2').retry = false;

      const results = await pool.pollAll();

      assert.deepEqual(results.map((r) => r.deviceId), ['nas-1']);
      assert.equal(fake(pool, 'nas-1').fetches, 1);
      assert.equal(fake(pool, 'nas-2').fetches, 0);
    });

    it('returns nothing for an empty inventory', async () => {
      const pool = makePool();
      assert.deepEqual(await pool.pollAll(), []);
    });
  });

  describe('close and health', () => {
    it('disconnects every device and forgets them', async () => {
      directory.devices = [device('nas-1'), device('nas-2')];
      directory.mappings.set('nas-1', new Map([['q', 'S1']]));
      const pool = makePool();
      await pool.refresh();
      const conns = [fake(pool, 'nas-1'), fake(pool, 'nas-2')];

      await pool.close();

      assert.equal(pool.size, 0);
      assert.deepEqual(conns.map((c) => c.disconnects), [1, 1]);
      assert.equal(pool.resolveSubscription('nas-1', 'q'), undefined);
    });

    it('reports device health for every tracked device', async () => {
      directory.devices = [device('nas-1'), device('nas-2')];
      const pool = makePool();
      await pool.refresh();

      assert.deepEqual(pool.getDeviceHealth().map((h) => h.deviceId), ['nas-1', 'nas-2']);
    });
  });
});

describe('DevicePool against an emulated device', () => {
  let emulator: RouterOSEmulator;
  let pool: DevicePool;

  beforeEach(async () => {
    emulator = new RouterOSEmulator({
      username: 'poller',
      password: 'test-secret',
      legacyLogin: true,
      responseDelayMs: 180,
      queues: [{ name: 'pppoe-alice', rate: '1/1' }],
    });
    const port = await emulator.start();
    const directory = new FakeDirectory();
    directory.devices = [device('nas-1', { host: '127.0.0.1', port })];
    pool = new DevicePool(
      { directory, mappings: directory },
      { connection: { timeoutMs: 200, backoff: { baseMs: 1000, maxMs: 60000 } } },
    );
  });

  afterEach(async () => {
    await pool.close();
    await emulator.stop();
  });

  function commandCount(command: string): number {
    return emulator.getLog().filter((entry) => entry.command === command).length;
  }

  it('never overlaps queue reads across back-to-back polls', async () => {
    const [first, second] = await Promise.all([pool.pollAll(), pool.pollAll()]);
    const third = await pool.pollAll();

    assert.deepEqual([first, second, third], [[], [], []]);
    assert.ok(commandCount('/queue/simple/print') <= 1, `${commandCount('/queue/simple/print')} queue reads`);
    assert.ok(commandCount('/login') <= 2, `${commandCount('/login')} login requests`);

    const conn = pool.getConnection('nas-1');
    assert.ok(conn);
    await waitFor(() => conn.getHealth().consecutiveFailures === 1);
    assert.equal(conn.isConnected(), false);
    assert.equal(conn.shouldRetry(), false);

    await pool.close();
    await waitFor(() => emulator.connectionCount === 0);
  });

  it('leaves no session behind when closed mid-login', async () => {
    const polling = pool.pollAll();
    await waitFor(() => commandCount('/login') >= 1);

    await pool.close();

    assert.deepEqual(await polling, []);
    assert.equal(commandCount('/queue/simple/print'), 0);
    await waitFor(() => emulator.connectionCount === 0);
  });
});
