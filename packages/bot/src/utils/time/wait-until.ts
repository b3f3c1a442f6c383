import { differenceInMilliseconds } from 'date-fns';
import { MAX_TIMER_DELAY_MS, WAIT_THRESHOLD_MS } from '@chatclock/shared';
import { timeLogger } from '../logger';

/**
 * Resolve after `ms` milliseconds.
 * Rejects with `signal.reason` if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wait until a given time.
 *
 * Delays of one second or less return immediately, so sub-second clock
 * jitter does not cause rapid-fire re-checks.
 *
 * @param target - Time to wait until
 * @param start - Time to measure the delay from (default: now)
 * @param signal - Aborts the wait; the promise rejects with the abort reason
 */
export async function waitUntil(
  target: Date,
  start: Date = new Date(),
  signal?: AbortSignal
): Promise<void> {
  let remaining = differenceInMilliseconds(target, start);

  if (remaining <= WAIT_THRESHOLD_MS) {
    timeLogger.debug({ target: target.toISOString(), delayMs: remaining }, 'Wait target already reached');
    return;
  }

  timeLogger.debug({ target: target.toISOString(), delayMs: remaining }, 'Waiting until target time');

  // Node.js timers overflow past ~24.8 days, so long waits are chained
  while (remaining > 0) {
    const slice = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await sleep(slice, signal);
    remaining -= slice;
  }
}
