/**
 * Bandwidth sample model and its stream encoding.
 */

import { QueueCounters } from '../devices/device-connection';

/** One normalized bandwidth reading, rates in bits per second */
export interface Sample {
  subscriptionId: string;
  deviceId: string;
  queueName: string;
  rxBps: number;
  txBps: number;
  sampleAt: Date;
}

/** Flat field set appended to the stream for one sample */
export interface StreamFields {
  subscription_id: string;
  device_id: string;
  queue_name: string;
  rx_bps: string;
  tx_bps: string;
  sample_at: string;
  [field: string]: string;
}

export function buildSample(
  subscriptionId: string,
  deviceId: string,
  counters: QueueCounters,
  sampleAt: Date,
): Sample {
  return {
    subscriptionId,
    deviceId,
    queueName: counters.name,
    rxBps: counters.rateRx * 8,
    txBps: counters.rateTx * 8,
    sampleAt,
  };
}

export function toStreamFields(sample: Sample): StreamFields {
  return {
    subscription_id: sample.subscriptionId,
    device_id: sample.deviceId,
    queue_name: sample.queueName,
    rx_bps: String(sample.rxBps),
    tx_bps: String(sample.txBps),
    sample_at: sample.sampleAt.toISOString(),
  };
}
