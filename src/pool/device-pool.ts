/**
 * Device Pool
 *
 * Owns one DeviceConnection per active device and the queue-to-subscription
 * snapshot used to resolve their counters. Inventory refresh runs on its
 * own interval, checked lazily at the start of each poll, so the poll
 * cadence never waits on the directory more than once a refresh interval.
 *
 * The mapping snapshot is built off to the side and swapped in whole;
 * resolveSubscription() never sees a half-updated table.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import {
  ConnectionFactory,
  ConnectionOptions,
  DEFAULT_CONNECTION_OPTIONS,
  DeviceConnection,
  DeviceEndpoint,
  DeviceHealth,
  QueueCounters,
  createConnection,
} from '../devices';
import { DeviceDirectory, InventoryDevice, QueueMappingStore } from '../inventory/types';

export interface DevicePoolConfig {
  vendor: string;
  refreshIntervalMs: number;
  connection: ConnectionOptions;
}

export interface DevicePoolDeps {
  directory: DeviceDirectory;
  mappings: QueueMappingStore;
  /** Defaults to createConnection */
  connectionFactory?: ConnectionFactory;
  now?: () => number;
}

export interface DevicePollResult {
  deviceId: string;
  counters: QueueCounters[];
}

export interface RefreshSummary {
  added: string[];
  removed: string[];
  replaced: string[];
  total: number;
}

export const DEFAULT_POOL_CONFIG: DevicePoolConfig = {
  vendor: 'mikrotik',
  refreshIntervalMs: 60000,
  connection: DEFAULT_CONNECTION_OPTIONS,
};

interface TrackedDevice {
  connection: DeviceConnection;
  /** Endpoint + credentials the connection was built from */
  fingerprint: string;
}

function toEndpoint(device: InventoryDevice): DeviceEndpoint | null {
  if (!device.host || !device.username || !device.password) return null;
  return {
    deviceId: device.id,
    vendor: device.vendor,
    host: device.host,
    port: device.port,
    username: device.username,
    password: device.password,
  };
}

function fingerprintOf(endpoint: DeviceEndpoint): string {
  return JSON.stringify([endpoint.vendor, endpoint.host, endpoint.port, endpoint.username, endpoint.password]);
}

export class DevicePool {
  private readonly config: DevicePoolConfig;
  private readonly directory: DeviceDirectory;
  private readonly mappingStore: QueueMappingStore;
  private readonly connectionFactory: ConnectionFactory;
  private readonly now: () => number;
  private readonly log: Logger;

  private devices: Map<string, TrackedDevice> = new Map();
  private mappings: Map<string, Map<string, string>> = new Map();
  private lastRefreshAt: number | null = null;
  private refreshing: Promise<RefreshSummary | null> | null = null;
  /** Connections whose last fetch has not settled yet */
  private fetching: Set<DeviceConnection> = new Set();

  constructor(deps: DevicePoolDeps, config: Partial<DevicePoolConfig> = {}) {
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    this.directory = deps.directory;
    this.mappingStore = deps.mappings;
    this.connectionFactory = deps.connectionFactory ?? createConnection;
    this.now = deps.now ?? Date.now;
    this.log = getLogger('DevicePool');
  }

  /** Number of tracked devices */
  get size(): number {
    return this.devices.size;
  }

  getDeviceIds(): string[] {
    return Array.from(this.devices.keys());
  }

  getConnection(deviceId: string): DeviceConnection | undefined {
    return this.devices.get(deviceId)?.connection;
  }

  getDeviceHealth(): DeviceHealth[] {
    return Array.from(this.devices.values()).map((d) => d.connection.getHealth());
  }

  /**
   * Converge the tracked set onto the directory. Returns null when the
   * directory could not be read; the current set is then kept as is.
   */
  refresh(): Promise<RefreshSummary | null> {
    if (!this.refreshing) {
      this.refreshing = this.doRefresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  /** Refresh when none has run yet or the refresh interval has elapsed. */
  async refreshIfDue(): Promise<void> {
    if (this.lastRefreshAt === null || this.now() - this.lastRefreshAt >= this.config.refreshIntervalMs) {
      await this.refresh();
    }
  }

  /**
   * Poll every device whose backoff allows it, concurrently. One device
   * failing, throwing or hanging never costs the others their results.
   * A device whose previous fetch is still running is skipped, so no
   * device is ever read by two cycles at once.
   */
  async pollAll(): Promise<DevicePollResult[]> {
    await this.refreshIfDue();

    const eligible = Array.from(this.devices.entries()).filter(([deviceId, tracked]) => {
      if (this.fetching.has(tracked.connection)) {
        this.log.debug({ deviceId }, 'Previous fetch still running, skipping');
        return false;
      }
      return tracked.connection.shouldRetry();
    });
    if (eligible.length === 0) return [];

    const guardMs = this.config.connection.timeoutMs * 2;
    const settled = await Promise.allSettled(
      eligible.map(([deviceId, tracked]) => this.pollDevice(deviceId, tracked.connection, guardMs)),
    );

    const results: DevicePollResult[] = [];
    settled.forEach((outcome, i) => {
      const deviceId = eligible[i][0];
      if (outcome.status === 'rejected') {
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        this.log.error({ deviceId, error: reason }, 'Device poll failed');
        return;
      }
      if (outcome.value.length > 0) {
        results.push({ deviceId, counters: outcome.value });
      }
    });
    return results;
  }

  /** Subscription for a queue in the current snapshot, or undefined. */
  resolveSubscription(deviceId: string, queueName: string): string | undefined {
    return this.mappings.get(deviceId)?.get(queueName);
  }

  /** Disconnect every device and forget them. */
  async close(): Promise<void> {
    if (this.refreshing) {
      await this.refreshing;
    }
    const tracked = Array.from(this.devices.values());
    this.devices = new Map();
    this.mappings = new Map();
    this.lastRefreshAt = null;
    await Promise.all(tracked.map((d) => this.safeDisconnect(d.connection)));
    this.log.info({ devices: tracked.length }, 'Device pool closed');
  }

  /**
   * Fetch from one device, bounded by `guardMs`. On expiry the connection
   * is torn down so the stuck read or login fails on its own; the device
   * stays marked as fetching until it does.
   */
  private pollDevice(deviceId: string, connection: DeviceConnection, guardMs: number): Promise<QueueCounters[]> {
    this.fetching.add(connection);
    const fetch = connection.fetchCounters().finally(() => {
      this.fetching.delete(connection);
    });

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const expired = new Error(`Device ${deviceId} did not answer within ${guardMs}ms`);
        this.safeDisconnect(connection).then(() => reject(expired), reject);
      }, guardMs);

      fetch.then(
        (counters) => {
          clearTimeout(timer);
          resolve(counters);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }

  private async doRefresh(): Promise<RefreshSummary | null> {
    this.lastRefreshAt = this.now();

    let listed: InventoryDevice[];
    try {
      listed = await this.directory.listActiveDevices(this.config.vendor);
    } catch (err) {
      this.log.error({ error: err instanceof Error ? err.message : String(err) }, 'Device directory unavailable, keeping current set');
      return null;
    }

    const summary: RefreshSummary = { added: [], removed: [], replaced: [], total: 0 };
    const next = new Map<string, TrackedDevice>();
    const retired: DeviceConnection[] = [];

    for (const device of listed) {
      if (!device.active || next.has(device.id)) continue;

      const endpoint = toEndpoint(device);
      if (!endpoint) {
        this.log.debug({ deviceId: device.id }, 'Device has no API credentials, skipping');
        continue;
      }

      const fingerprint = fingerprintOf(endpoint);
      const existing = this.devices.get(device.id);
      if (existing && existing.fingerprint === fingerprint) {
        next.set(device.id, existing);
        continue;
      }

      let connection: DeviceConnection;
      try {
        connection = this.connectionFactory(endpoint, this.config.connection);
      } catch (err) {
        this.log.warn({ deviceId: device.id, error: err instanceof Error ? err.message : String(err) }, 'Cannot create connection');
        continue;
      }

      next.set(device.id, { connection, fingerprint });
      if (existing) {
        retired.push(existing.connection);
        summary.replaced.push(device.id);
      } else {
        summary.added.push(device.id);
      }
    }

    for (const [deviceId, tracked] of this.devices) {
      if (!next.has(deviceId)) {
        retired.push(tracked.connection);
        summary.removed.push(deviceId);
      }
    }

    const nextMappings = new Map<string, Map<string, string>>();
    await Promise.all(Array.from(next.keys()).map(async (deviceId) => {
      try {
        nextMappings.set(deviceId, await this.mappingStore.getDeviceMapping(deviceId));
      } catch (err) {
        const previous = this.mappings.get(deviceId);
        if (previous) nextMappings.set(deviceId, previous);
        this.log.warn({ deviceId, error: err instanceof Error ? err.message : String(err) }, 'Queue mapping load failed');
      }
    }));

    this.devices = next;
    this.mappings = nextMappings;
    await Promise.all(retired.map((c) => this.safeDisconnect(c)));

    summary.total = next.size;
    this.log.info(
      { devices: summary.total, added: summary.added.length, removed: summary.removed.length, replaced: summary.replaced.length },
      'Device pool refreshed',
    );
    return summary;
  }

  private async safeDisconnect(connection: DeviceConnection): Promise<void> {
    try {
      await connection.disconnect();
    } catch (err) {
      this.log.warn({ deviceId: connection.deviceId, error: err instanceof Error ? err.message : String(err) }, 'Disconnect failed');
    }
  }
}
