/**
 * DeviceConnection Interface
 *
 * Every polled access device (RouterOS today, other vendors later) is
 * reached through one of these. The DevicePool owns them and never looks
 * behind the interface, so a new vendor is a new implementation plus an
 * entry in createConnection().
 *
 * Failures are state, not exceptions: connect() and fetchCounters()
 * resolve even when the device is down, and shouldRetry() tells the pool
 * whether it is worth trying again yet.
 */

/** Traffic counters of one shaping queue, rates in bytes per second */
export interface QueueCounters {
  name: string;
  target: string;
  rateRx: number;
  rateTx: number;
  bytesRx: number;
  bytesTx: number;
  packetsRx: number;
  packetsTx: number;
}

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'backoff';

/** Health snapshot for a single device */
export interface DeviceHealth {
  deviceId: string;
  vendor: string;
  host: string;
  port: number;
  state: ConnectionState;
  consecutiveFailures: number;
  lastSuccessAt: Date | null;
  lastAttemptAt: Date | null;
  lastError: string | null;
}

export interface DeviceConnection {
  readonly deviceId: string;
  readonly vendor: string;

  /** Open transport and authenticate. Resolves false on failure. */
  connect(): Promise<boolean>;

  /**
   * Close the transport, including one still being opened; a fetch in
   * flight then fails. Safe to call repeatedly.
   */
  disconnect(): Promise<void>;

  /** Read all queue counters; empty on failure. */
  fetchCounters(): Promise<QueueCounters[]>;

  /** Whether the backoff window allows another attempt now */
  shouldRetry(): boolean;

  isConnected(): boolean;

  getHealth(): DeviceHealth;
}

/** Where and how to reach a device */
export interface DeviceEndpoint {
  deviceId: string;
  vendor: string;
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface BackoffConfig {
  baseMs: number;
  maxMs: number;
}

export interface ConnectionOptions {
  timeoutMs: number;
  backoff: BackoffConfig;
  /** Clock override, epoch ms */
  now?: () => number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseMs: 1000,
  maxMs: 60000,
};

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  timeoutMs: 2000,
  backoff: DEFAULT_BACKOFF,
};
