/**
 * RouterOS Connection
 *
 * Owns the API session to one MikroTik device together with its backoff
 * state. The pool calls fetchCounters() once per cycle at most; a missing
 * session is re-established on the way in, and any failure drops the
 * session so the next eligible attempt starts from a clean login.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { RouterOSClient } from './routeros-client';
import { RouterOSError } from './routeros-protocol';
import { parseQueueRecord } from './counter-parser';
import { isRetryDue } from './backoff';
import {
  ConnectionOptions,
  ConnectionState,
  DEFAULT_CONNECTION_OPTIONS,
  DeviceConnection,
  DeviceEndpoint,
  DeviceHealth,
  QueueCounters,
} from './device-connection';

export const ROUTEROS_DEFAULT_PORT = 8728;

const QUEUE_PRINT = '/queue/simple/print';

export class RouterOSConnection implements DeviceConnection {
  readonly deviceId: string;
  readonly vendor: string;

  private readonly endpoint: DeviceEndpoint;
  private readonly options: ConnectionOptions;
  private readonly now: () => number;
  private readonly log: Logger;
  private client: RouterOSClient | null = null;
  private connecting: Promise<boolean> | null = null;
  /** Aborts the session being opened, if any */
  private opening: AbortController | null = null;

  private _consecutiveFailures = 0;
  private _lastSuccessAt: number | null = null;
  private _lastAttemptAt: number | null = null;
  private _lastError: string | null = null;

  constructor(endpoint: DeviceEndpoint, options: ConnectionOptions = DEFAULT_CONNECTION_OPTIONS) {
    this.endpoint = endpoint;
    this.deviceId = endpoint.deviceId;
    this.vendor = endpoint.vendor;
    this.options = options;
    this.now = options.now ?? Date.now;
    this.log = getLogger('RouterOS').child({ deviceId: endpoint.deviceId, host: endpoint.host });
  }

  get consecutiveFailures(): number {
    return this._consecutiveFailures;
  }

  get lastSuccessAt(): number | null {
    return this._lastSuccessAt;
  }

  get lastAttemptAt(): number | null {
    return this._lastAttemptAt;
  }

  connect(): Promise<boolean> {
    if (!this.connecting) {
      this.connecting = this.openSession().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /** Closes the live session and any session still logging in. */
  async disconnect(): Promise<void> {
    const opening = this.opening;
    this.opening = null;
    opening?.abort();

    const client = this.client;
    this.client = null;
    if (client) {
      client.close();
      this.log.debug('Session closed');
    }
  }

  isConnected(): boolean {
    return this.client !== null && this.client.isOpen;
  }

  shouldRetry(): boolean {
    return isRetryDue(this._consecutiveFailures, this._lastAttemptAt, this.now(), this.options.backoff);
  }

  async fetchCounters(): Promise<QueueCounters[]> {
    if (!this.isConnected()) {
      const ok = await this.connect();
      if (!ok) return [];
    }

    const client = this.client;
    if (!client) return [];

    this._lastAttemptAt = this.now();
    try {
      const records = await client.command(QUEUE_PRINT);
      this._consecutiveFailures = 0;
      this._lastError = null;
      return records.map(parseQueueRecord);
    } catch (err) {
      this.recordFailure('Queue read failed', err);
      await this.disconnect();
      return [];
    }
  }

  getHealth(): DeviceHealth {
    return {
      deviceId: this.deviceId,
      vendor: this.vendor,
      host: this.endpoint.host,
      port: this.endpoint.port,
      state: this.currentState(),
      consecutiveFailures: this._consecutiveFailures,
      lastSuccessAt: this._lastSuccessAt !== null ? new Date(this._lastSuccessAt) : null,
      lastAttemptAt: this._lastAttemptAt !== null ? new Date(this._lastAttemptAt) : null,
      lastError: this._lastError,
    };
  }

  private currentState(): ConnectionState {
    if (this.connecting) return 'connecting';
    if (this.isConnected()) return 'connected';
    if (!this.shouldRetry()) return 'backoff';
    return 'disconnected';
  }

  private async openSession(): Promise<boolean> {
    await this.disconnect();
    this._lastAttemptAt = this.now();
    const opening = new AbortController();
    this.opening = opening;

    try {
      const client = await RouterOSClient.open({
        host: this.endpoint.host,
        port: this.endpoint.port,
        username: this.endpoint.username,
        password: this.endpoint.password,
        timeoutMs: this.options.timeoutMs,
      }, opening.signal);
      if (opening.signal.aborted) {
        client.close();
        throw new RouterOSError('closed', 'Disconnected while logging in');
      }
      this.client = client;
    } catch (err) {
      this.recordFailure('Connect failed', err);
      return false;
    } finally {
      if (this.opening === opening) this.opening = null;
    }

    this._consecutiveFailures = 0;
    this._lastSuccessAt = this.now();
    this._lastError = null;
    this.log.info({ port: this.endpoint.port }, 'Connected');
    return true;
  }

  private recordFailure(what: string, err: unknown): void {
    this._consecutiveFailures++;
    this._lastError = err instanceof Error ? err.message : String(err);
    this.log.warn(
      { failures: this._consecutiveFailures, error: this._lastError },
      what,
    );
  }
}
