/**
 * Publisher
 *
 * Appends sample batches to the stream sink. append() returns at once and
 * the write runs in the background, so the poll loop can start gathering
 * the next cycle while the previous batch is still on the wire.
 *
 * Every sample of a batch is attempted; failures are logged and counted
 * per sample. There is no retry queue: the next cycle brings fresh rates.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { Sample, toStreamFields } from './sample';
import { StreamSink } from './stream-sink';

export interface PublisherConfig {
  streamName: string;
  maxLength: number;
}

export interface PublishResult {
  attempted: number;
  published: number;
  failed: number;
}

export interface PublisherStats {
  batches: number;
  published: number;
  failed: number;
  inFlight: number;
}

export const DEFAULT_PUBLISHER_CONFIG: PublisherConfig = {
  streamName: 'bandwidth:samples',
  maxLength: 100000,
};

export class Publisher {
  private readonly sink: StreamSink;
  private readonly config: PublisherConfig;
  private readonly log: Logger;
  private inFlight: Set<Promise<PublishResult>> = new Set();
  private closing: Promise<void> | null = null;

  private batches = 0;
  private published = 0;
  private failed = 0;

  constructor(sink: StreamSink, config: Partial<PublisherConfig> = {}) {
    this.sink = sink;
    this.config = { ...DEFAULT_PUBLISHER_CONFIG, ...config };
    this.log = getLogger('Publisher');
  }

  /** Start writing a batch in the background. */
  append(samples: Sample[]): void {
    if (samples.length === 0) return;
    if (this.closing) {
      this.log.warn({ samples: samples.length }, 'Publisher closed, batch discarded');
      return;
    }

    const task: Promise<PublishResult> = this.publish(samples).then((result) => {
      this.inFlight.delete(task);
      return result;
    });
    this.inFlight.add(task);
  }

  /** Write a batch and report per-sample outcome. Never rejects. */
  async publish(samples: Sample[]): Promise<PublishResult> {
    const { streamName, maxLength } = this.config;
    const outcomes = await Promise.allSettled(
      samples.map((sample) => this.sink.add(streamName, toStreamFields(sample), maxLength)),
    );

    const result: PublishResult = { attempted: samples.length, published: 0, failed: 0 };
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        result.published++;
        return;
      }
      result.failed++;
      const sample = samples[i];
      this.log.error(
        {
          subscriptionId: sample.subscriptionId,
          deviceId: sample.deviceId,
          queue: sample.queueName,
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        },
        'Sample append failed',
      );
    });

    this.batches++;
    this.published += result.published;
    this.failed += result.failed;
    return result;
  }

  /** Wait for every background write started so far. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  /** Drain in-flight writes, then close the sink. Idempotent. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.flush().then(() => this.sink.close());
    }
    return this.closing;
  }

  getStats(): PublisherStats {
    return {
      batches: this.batches,
      published: this.published,
      failed: this.failed,
      inFlight: this.inFlight.size,
    };
  }
}
