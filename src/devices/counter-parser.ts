/**
 * Queue counter parsing.
 *
 * RouterOS reports simple-queue counters as paired "rx/tx" strings, e.g.
 * rate=12500/67000 (bytes per second), bytes=..., packets=....
 * Anything that isn't a plain non-negative integer counts as 0.
 */

import { QueueCounters } from './device-connection';

export interface CounterPair {
  rx: number;
  tx: number;
}

function parseCount(token: string | undefined): number {
  if (token === undefined) return 0;
  const trimmed = token.trim();
  if (!/^\d+$/.test(trimmed)) return 0;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : 0;
}

export function parseCounterPair(value: string | undefined): CounterPair {
  if (value === undefined) return { rx: 0, tx: 0 };
  const [rx, tx] = value.split('/');
  return { rx: parseCount(rx), tx: parseCount(tx) };
}

/** Map one /queue/simple record onto QueueCounters. */
export function parseQueueRecord(record: Record<string, string>): QueueCounters {
  const rate = parseCounterPair(record.rate);
  const bytes = parseCounterPair(record.bytes);
  const packets = parseCounterPair(record.packets);

  return {
    name: record.name ?? '',
    target: record.target ?? '',
    rateRx: rate.rx,
    rateTx: rate.tx,
    bytesRx: bytes.rx,
    bytesTx: bytes.tx,
    packetsRx: packets.rx,
    packetsTx: packets.tx,
  };
}
