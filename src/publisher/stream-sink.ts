/**
 * Stream sinks.
 *
 * A sink appends one flat record to a named, length-capped stream.
 * RedisStreamSink maps that onto XADD <stream> MAXLEN <n> * field value ...
 * with exact trimming, so the stream never holds more than n entries.
 */

import Redis from 'ioredis';
import { Logger } from 'pino';
import { getLogger } from '../logger';

export interface StreamSink {
  /** Append one entry, trimming the oldest beyond maxLength. Resolves to the entry id. */
  add(stream: string, fields: Record<string, string>, maxLength: number): Promise<string | null>;
  /** Release the client. Safe to call repeatedly. */
  close(): Promise<void>;
}

export interface RedisSinkOptions {
  url: string;
  commandTimeoutMs?: number;
}

export class RedisStreamSink implements StreamSink {
  private readonly client: Redis;
  private readonly log: Logger;
  private closed = false;

  constructor(options: RedisSinkOptions) {
    this.log = getLogger('RedisSink');
    this.client = new Redis(options.url, {
      maxRetriesPerRequest: 1,
      commandTimeout: options.commandTimeoutMs ?? 5000,
    });

    this.client.on('error', (err: Error) => {
      this.log.warn({ error: err.message }, 'Redis client error');
    });
    this.client.on('ready', () => {
      this.log.info('Redis connection ready');
    });
  }

  async add(stream: string, fields: Record<string, string>, maxLength: number): Promise<string | null> {
    const flat: string[] = [];
    for (const [field, value] of Object.entries(fields)) {
      flat.push(field, value);
    }
    return this.client.xadd(stream, 'MAXLEN', maxLength, '*', ...flat);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.client.quit();
    } catch (err) {
      this.log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Redis quit failed, dropping connection');
      this.client.disconnect();
    }
  }
}
