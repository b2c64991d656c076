/**
 * Bounded polling
 *
 * Fixed-interval retries with an injectable clock so tests never sleep.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { OperationTimeoutError } from './errors.js';

export interface Clock {
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  async sleep(ms: number): Promise<void> {
    await sleep(ms);
  },
};

export interface PollOptions {
  /** Delay between attempts in milliseconds */
  intervalMs: number;
  /** Number of checks before giving up */
  maxAttempts: number;
  clock: Clock;
}

export const DEFAULT_POLL_OPTIONS: PollOptions = {
  intervalMs: 1000,
  maxAttempts: 500,
  clock: systemClock,
};

/**
 * Run `check` until it reports completion.
 *
 * @param operation - Description used in the timeout error
 * @returns Number of attempts used
 * @throws OperationTimeoutError after maxAttempts unsuccessful checks
 */
export async function pollUntil(
  operation: string,
  check: () => Promise<boolean>,
  options: PollOptions
): Promise<number> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    if (await check()) {
      return attempt;
    }
    if (attempt < options.maxAttempts) {
      await options.clock.sleep(options.intervalMs);
    }
  }
  throw new OperationTimeoutError(operation, options.maxAttempts);
}
