import { setTimeout as delay } from 'node:timers/promises';
import { initLogger } from '../logger';

/** Keep test output clean; every suite imports this first. */
export function quietLogs(): void {
  initLogger({ level: 'silent', pretty: false });
}

/** Poll until `check` holds or the deadline passes. */
export async function waitFor(check: () => boolean, timeoutMs = 2000, stepMs = 10): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await delay(stepMs);
  }
}
