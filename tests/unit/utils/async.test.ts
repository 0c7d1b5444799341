/**
 * Async Utility Tests
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import { TimeoutError, withTimeout } from '@/utils/async';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100)).resolves.toBe(42);
  });

  test('passes the promise through without a positive timeout', async () => {
    await expect(withTimeout(Promise.resolve('a'))).resolves.toBe('a');
    await expect(withTimeout(Promise.resolve('b'), 0)).resolves.toBe('b');
    await expect(withTimeout(Promise.resolve('c'), Number.POSITIVE_INFINITY)).resolves.toBe('c');
  });

  test('rejects with TimeoutError naming the context', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 50, { context: 'query embedding' });
    const assertion = expect(pending).rejects.toThrow('Timeout after 50ms: query embedding');
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  test('TimeoutError carries the timeout', () => {
    const error = new TimeoutError(1500);
    expect(error.name).toBe('TimeoutError');
    expect(error.timeoutMs).toBe(1500);
    expect(error.message).toBe('Operation timed out after 1500ms');
  });

  test('rejects with the abort reason while the promise is still pending', async () => {
    const controller = new AbortController();
    const pending = withTimeout(new Promise<never>(() => {}), 60_000, { signal: controller.signal });
    controller.abort(new Error('cancelled'));
    await expect(pending).rejects.toThrow('cancelled');
  });

  test('rejects at once on an already aborted signal, even without a timeout', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    await expect(withTimeout(Promise.resolve(1), 0, { signal: controller.signal })).rejects.toThrow('cancelled');
  });

  test('resolves normally when the signal never aborts', async () => {
    const controller = new AbortController();
    await expect(withTimeout(Promise.resolve(7), undefined, { signal: controller.signal })).resolves.toBe(7);
  });

  test('propagates the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100)).rejects.toThrow('boom');
  });
});
