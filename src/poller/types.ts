/**
 * Poller Types
 */

import { DevicePollResult } from '../pool/device-pool';
import { Sample } from '../publisher/sample';
import { PublisherStats } from '../publisher/publisher';

/** idle -> running -> stopping -> stopped (terminal) */
export type PollerState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface PollerConfig {
  /** Kill switch; when false run() returns without polling */
  enabled: boolean;
  /** Target time between cycle starts */
  intervalMs: number;
  /** Log cycle/sample counters every N cycles */
  statsEveryCycles: number;
}

export const DEFAULT_POLLER_CONFIG: PollerConfig = {
  enabled: true,
  intervalMs: 1000,
  statsEveryCycles: 60,
};

/** What the poller needs from the device side (DevicePool) */
export interface CounterSource {
  pollAll(): Promise<DevicePollResult[]>;
  resolveSubscription(deviceId: string, queueName: string): string | undefined;
  close(): Promise<void>;
}

/** What the poller needs from the publishing side (Publisher) */
export interface SampleSink {
  append(samples: Sample[]): void;
  close(): Promise<void>;
  getStats(): PublisherStats;
}

/** Emitted as 'cycle' after every completed cycle */
export interface CycleReport {
  cycle: number;
  /** Monotonic start time (performance.now) */
  startedAt: number;
  sampleAt: Date;
  devices: number;
  samples: number;
  dropped: number;
  durationMs: number;
}

export interface PollerStats {
  state: PollerState;
  cycles: number;
  samples: number;
  droppedSamples: number;
  errors: number;
  publishFailures: number;
  lastCycleMs: number | null;
  lastCycleAt: Date | null;
}
