import { BackoffConfig } from './device-connection';

/** Delay after `failures` consecutive failures: base * 2^failures, capped at max. */
export function backoffDelayMs(failures: number, config: BackoffConfig): number {
  if (failures <= 0) return 0;
  return Math.min(config.maxMs, config.baseMs * Math.pow(2, failures));
}

/**
 * Whether a device that has failed `failures` times in a row may be tried
 * again. `referenceAt` is the last attempt; with none on record the device
 * is always eligible.
 */
export function isRetryDue(
  failures: number,
  referenceAt: number | null,
  now: number,
  config: BackoffConfig,
): boolean {
  if (failures <= 0 || referenceAt === null) return true;
  return now - referenceAt >= backoffDelayMs(failures, config);
}
