import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  backoffDelay,
  chunk,
  isCancellation,
  parseTimestamp,
  sleep,
  SyncCancelledError,
  toErrorMessage,
  toPercentage,
  withTimeout
} from './utils';

describe('sync utils', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('splits items into fixed-size batches', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 50)).toEqual([]);
    expect(chunk([1, 2], 0)).toEqual([[1], [2]]);
  });

  it('doubles the delay on every attempt', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, 500))).toEqual([500, 1000, 2000, 4000]);
  });

  it('computes truncated percentages', () => {
    expect(toPercentage(1, 3)).toBe(33);
    expect(toPercentage(3, 3)).toBe(100);
    expect(toPercentage(0, 0)).toBe(0);
  });

  it('reads error messages from unknown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage({})).toBe('Unknown sync error');
  });

  it('parses only valid timestamps', () => {
    expect(parseTimestamp('2024-01-01T00:00:00.000Z')).toBe(Date.UTC(2024, 0, 1));
    expect(parseTimestamp('not a date')).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
  });

  it('recognizes cancellation by error type or by signal', () => {
    const controller = new AbortController();

    expect(isCancellation(new SyncCancelledError(), undefined)).toBe(true);
    expect(isCancellation(new Error('x'), controller.signal)).toBe(false);

    controller.abort();
    expect(isCancellation(new Error('x'), controller.signal)).toBe(true);
  });

  it('rejects a sleep when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();

    const pending = sleep(10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(SyncCancelledError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(10, controller.signal)).rejects.toThrow('Sync was cancelled');
  });

  it('fails a slow task with a labelled timeout', async () => {
    vi.useFakeTimers();

    const pending = withTimeout(new Promise<never>(() => undefined), 1000, 'sync_pull');
    const assertion = expect(pending).rejects.toThrow('sync_pull timeout after 1000ms');
    await vi.advanceTimersByTimeAsync(1000);

    await assertion;
  });

  it('passes through a task that settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'task')).resolves.toBe(7);
  });
});
