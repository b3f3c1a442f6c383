/**
 * Tests for deadline waits
 *
 * Tests for:
 * - sleep resolution and cancellation
 * - waitUntil threshold for short delays
 * - waitUntil suspension and cancellation
 * - Waits longer than a single timer allows
 */

import { MAX_TIMER_DELAY_MS } from '@chatclock/shared';
import { sleep, waitUntil } from '../wait-until';
import { timeLogger } from '../../logger';

const start = new Date('2024-01-01T00:00:00Z');
const after = (ms: number): Date => new Date(start.getTime() + ms);

beforeEach(() => {
  jest.useFakeTimers();
  jest.clearAllMocks();
});

afterEach(() => {
  jest.useRealTimers();
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    const done = jest.fn();
    const promise = sleep(300).then(done);

    await jest.advanceTimersByTimeAsync(299);
    expect(done).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    await promise;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should reject with the abort reason and clear its timer', async () => {
    const controller = new AbortController();
    const promise = sleep(10000, controller.signal);

    controller.abort(new Error('shutdown'));

    await expect(promise).rejects.toThrow('shutdown');
    expect(jest.getTimerCount()).toBe(0);
  });
});

describe('waitUntil', () => {
  it('should return immediately for sub-second delays', async () => {
    await waitUntil(after(500), start);

    expect(jest.getTimerCount()).toBe(0);
    expect(timeLogger.debug).toHaveBeenCalledWith(
      { target: '2024-01-01T00:00:00.500Z', delayMs: 500 },
      'Wait target already reached'
    );
  });

  it('should return immediately at exactly one second', async () => {
    await waitUntil(after(1000), start);

    expect(jest.getTimerCount()).toBe(0);
  });

  it('should return immediately for past targets', async () => {
    await waitUntil(after(-60000), start);

    expect(jest.getTimerCount()).toBe(0);
  });

  it('should suspend until the target time', async () => {
    const done = jest.fn();
    const promise = waitUntil(after(5000), start).then(done);

    expect(timeLogger.debug).toHaveBeenCalledWith(
      { target: '2024-01-01T00:00:05.000Z', delayMs: 5000 },
      'Waiting until target time'
    );

    await jest.advanceTimersByTimeAsync(4999);
    expect(done).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    await promise;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should be cancellable while suspended', async () => {
    const controller = new AbortController();
    const promise = waitUntil(after(5000), start, controller.signal);

    await jest.advanceTimersByTimeAsync(2000);
    controller.abort(new Error('task cancelled'));

    await expect(promise).rejects.toThrow('task cancelled');
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should reject with an AbortError by default', async () => {
    const controller = new AbortController();
    const promise = waitUntil(after(5000), start, controller.signal);

    controller.abort();

    await expect(promise).rejects.toHaveProperty('name', 'AbortError');
  });

  it('should not start waiting on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(waitUntil(after(5000), start, controller.signal)).rejects.toHaveProperty(
      'name',
      'AbortError'
    );
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should wait out delays longer than a single timer allows', async () => {
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    const done = jest.fn();
    const promise = waitUntil(after(thirtyDays), start).then(done);

    await jest.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    expect(done).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(thirtyDays - MAX_TIMER_DELAY_MS);
    await promise;
    expect(done).toHaveBeenCalledTimes(1);
  });
});
