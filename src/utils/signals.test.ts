import { afterEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns null when disabled', () => {
    expect(createTimeoutSignal()).toBeNull();
    expect(createTimeoutSignal(0)).toBeNull();
    expect(createTimeoutSignal(false)).toBeNull();
  });

  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    expect(timeout?.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(timeout?.signal.aborted).toBe(true);
    const reason: unknown = timeout?.signal.reason;
    expect(reason).toBeInstanceOf(TimeoutError);
    expect(reason instanceof TimeoutError && reason.message).toBe('request timed out after 50ms');
  });

  it('does not abort once released', async () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(20);

    timeout?.release();
    await vi.advanceTimersByTimeAsync(50);

    expect(timeout?.signal.aborted).toBe(false);
  });

  it('creates independent signals for separate invocations', () => {
    vi.useFakeTimers();

    const first = createTimeoutSignal(10);
    const second = createTimeoutSignal(20);

    vi.advanceTimersByTime(15);

    expect(first?.signal.aborted).toBe(true);
    expect(second?.signal.aborted).toBe(false);
  });
});

describe('mergeSignals', () => {
  it('returns null when no signals are provided', () => {
    expect(mergeSignals([])).toBeNull();
    expect(mergeSignals([null, undefined])).toBeNull();
  });

  it('returns the single active signal when only one is provided', () => {
    const controller = new AbortController();
    expect(mergeSignals([controller.signal, null])?.signal).toBe(controller.signal);
  });

  it('propagates aborts and preserves the provided reason', () => {
    const controllerA = new AbortController();
    const controllerB = new AbortController();

    const merged = mergeSignals([controllerA.signal, controllerB.signal]);

    const abortReason = new AbortError('client was closed');
    controllerB.abort(abortReason);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(abortReason);
  });

  it('immediately aborts when merging an already-aborted signal', () => {
    const controller = new AbortController();
    const reason = new Error('existing abort');
    controller.abort(reason);

    const merged = mergeSignals([controller.signal, new AbortController().signal]);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(reason);
  });

  it('detaches from long-lived sources on release', () => {
    const longLived = new AbortController();
    const perRequest = new AbortController();
    const removeSpy = vi.spyOn(longLived.signal, 'removeEventListener');

    const merged = mergeSignals([perRequest.signal, longLived.signal]);
    merged?.release();

    expect(removeSpy).toHaveBeenCalledWith('abort', expect.any(Function));

    longLived.abort(new AbortError('client was closed'));
    expect(merged?.signal.aborted).toBe(false);
  });
});
