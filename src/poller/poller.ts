/**
 * Bandwidth Poller
 *
 * Drives the fixed-interval cycle: poll every device, resolve queues to
 * subscriptions, hand the batch to the publisher, sleep out the rest of
 * the interval. A cycle that overruns the interval is followed at once by
 * the next one; missed cycles are never made up.
 *
 * Cycles are strictly sequential, so no device is ever polled by two
 * cycles at the same time. stop() is cooperative: the running cycle
 * finishes, the sleep is cut short, then devices and the stream client
 * are closed before stop() resolves.
 *
 * Events:
 *   'stateChange' (state: PollerState, prev: PollerState)
 *   'cycle' (report: CycleReport)
 */

import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { setTimeout as delay } from 'timers/promises';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { Sample, buildSample } from '../publisher/sample';
import {
  CounterSource,
  CycleReport,
  DEFAULT_POLLER_CONFIG,
  PollerConfig,
  PollerState,
  PollerStats,
  SampleSink,
} from './types';

export class Poller extends EventEmitter {
  private readonly source: CounterSource;
  private readonly sink: SampleSink;
  private readonly config: PollerConfig;
  private readonly log: Logger;

  private _state: PollerState = 'idle';
  private runPromise: Promise<void> | null = null;
  private sleepAbort: AbortController | null = null;

  private cycles = 0;
  private samples = 0;
  private droppedSamples = 0;
  private errors = 0;
  private lastCycleMs: number | null = null;
  private lastCycleAt: Date | null = null;

  constructor(source: CounterSource, sink: SampleSink, config: Partial<PollerConfig> = {}) {
    super();
    this.source = source;
    this.sink = sink;
    this.config = { ...DEFAULT_POLLER_CONFIG, ...config };
    this.log = getLogger('Poller');
  }

  get state(): PollerState {
    return this._state;
  }

  /**
   * Run until stop(). Resolves once everything is closed. May only be
   * called once.
   */
  run(): Promise<void> {
    if (this._state !== 'idle') {
      return Promise.reject(new Error(`Poller cannot run from state "${this._state}"`));
    }
    this.runPromise = this.loop();
    return this.runPromise;
  }

  async stop(): Promise<void> {
    if (this._state === 'idle') {
      this.runPromise = this.shutdown();
    } else if (this._state === 'running') {
      this.setState('stopping');
      this.sleepAbort?.abort();
    }
    if (this.runPromise) {
      await this.runPromise;
    }
  }

  getStats(): PollerStats {
    return {
      state: this._state,
      cycles: this.cycles,
      samples: this.samples,
      droppedSamples: this.droppedSamples,
      errors: this.errors,
      publishFailures: this.sink.getStats().failed,
      lastCycleMs: this.lastCycleMs,
      lastCycleAt: this.lastCycleAt,
    };
  }

  /** One cycle without the cadence loop. */
  async pollOnce(): Promise<CycleReport> {
    const startedAt = performance.now();
    const sampleAt = new Date();
    const results = await this.source.pollAll();

    const batch: Sample[] = [];
    let dropped = 0;
    for (const { deviceId, counters } of results) {
      for (const queue of counters) {
        const subscriptionId = this.source.resolveSubscription(deviceId, queue.name);
        if (subscriptionId === undefined) {
          dropped++;
          continue;
        }
        batch.push(buildSample(subscriptionId, deviceId, queue, sampleAt));
      }
    }

    this.sink.append(batch);
    this.samples += batch.length;
    this.droppedSamples += dropped;

    const report: CycleReport = {
      cycle: this.cycles + 1,
      startedAt,
      sampleAt,
      devices: results.length,
      samples: batch.length,
      dropped,
      durationMs: performance.now() - startedAt,
    };
    this.log.debug(
      { cycle: report.cycle, devices: report.devices, samples: report.samples, dropped },
      'Cycle complete',
    );
    return report;
  }

  private async loop(): Promise<void> {
    if (!this.config.enabled) {
      this.log.warn('Bandwidth polling is disabled');
      await this.shutdown();
      return;
    }

    this.setState('running');
    this.log.info({ intervalMs: this.config.intervalMs }, 'Starting bandwidth poller');

    try {
      while (this.isRunning()) {
        const start = performance.now();

        try {
          const report = await this.pollOnce();
          this.emit('cycle', report);
        } catch (err) {
          this.errors++;
          this.log.error(
            { error: err instanceof Error ? err.message : String(err), errors: this.errors },
            'Polling cycle failed',
          );
        }

        this.cycles++;
        const elapsed = performance.now() - start;
        this.lastCycleMs = elapsed;
        this.lastCycleAt = new Date();

        if (this.cycles % this.config.statsEveryCycles === 0) {
          this.logStats();
        }

        const wait = this.config.intervalMs - elapsed;
        if (wait > 0 && this.isRunning()) {
          await this.sleep(wait);
        }
      }
    } finally {
      await this.shutdown();
    }
  }

  private isRunning(): boolean {
    return this._state === 'running';
  }

  private async sleep(ms: number): Promise<void> {
    const controller = new AbortController();
    this.sleepAbort = controller;
    try {
      await delay(ms, undefined, { signal: controller.signal });
    } catch (err) {
      if (!controller.signal.aborted) throw err;
    } finally {
      this.sleepAbort = null;
    }
  }

  private async shutdown(): Promise<void> {
    if (this._state !== 'stopping') {
      this.setState('stopping');
    }

    try {
      await this.source.close();
    } catch (err) {
      this.log.error({ error: err instanceof Error ? err.message : String(err) }, 'Closing devices failed');
    }
    try {
      await this.sink.close();
    } catch (err) {
      this.log.error({ error: err instanceof Error ? err.message : String(err) }, 'Closing stream client failed');
    }

    this.setState('stopped');
    this.logStats();
    this.log.info('Bandwidth poller stopped');
  }

  private logStats(): void {
    const stats = this.getStats();
    this.log.info(
      {
        cycles: stats.cycles,
        samples: stats.samples,
        dropped: stats.droppedSamples,
        errors: stats.errors,
        publishFailures: stats.publishFailures,
        lastCycleMs: stats.lastCycleMs !== null ? Math.round(stats.lastCycleMs) : null,
      },
      'Poller stats',
    );
  }

  private setState(next: PollerState): void {
    if (this._state === next) return;
    const prev = this._state;
    this._state = next;
    this.emit('stateChange', next, prev);
  }
}
