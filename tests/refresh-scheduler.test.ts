import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { RefreshScheduler } from '../src/main/services/refresh-scheduler';
import type { SnapshotSource } from '../src/main/services/snapshot-manager';
import type { CollectionResult } from '../src/shared/types/system';
import { ErrorCode, TelemetryError } from '../src/shared/types/errors';
import { failedResult, okResult } from './helpers/fake-host';

/** A source whose cycles stay in flight until the test settles them */
function deferredSource() {
  const pending: Array<(result: CollectionResult) => void> = [];
  const source = {
    collect: vi.fn(() => new Promise<CollectionResult>((resolve) => pending.push(resolve))),
  } satisfies SnapshotSource;
  const settle = (result: CollectionResult): void => {
    const resolve = pending.shift();
    if (!resolve) throw new Error('no cycle in flight');
    resolve(result);
  };
  return { source, settle };
}

function immediateSource(...results: CollectionResult[]) {
  let i = 0;
  return {
    collect: vi.fn(async () => results[Math.min(i++, results.length - 1)]),
  } satisfies SnapshotSource;
}

function nextResult(scheduler: RefreshScheduler): Promise<CollectionResult> {
  return new Promise((resolve) => {
    const unsubscribe = scheduler.subscribe({
      onResult: (result) => {
        unsubscribe();
        resolve(result);
      },
    });
  });
}

describe('RefreshScheduler', () => {
  let scheduler: RefreshScheduler | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(async () => {
    await scheduler?.shutdown();
    scheduler = null;
    vi.useRealTimers();
  });

  describe('manual refresh', () => {
    it('runs while auto-refresh is disabled', async () => {
      const source = immediateSource(okResult('2026-10-19T12:00:00.000Z'));
      scheduler = new RefreshScheduler(source, { autoRefresh: false, refreshOnStart: false });

      const result = await scheduler.triggerManualRefresh();

      expect(result?.ok).toBe(true);
      expect(scheduler.getLastSnapshot()?.timestamp).toBe('2026-10-19T12:00:00.000Z');
    });

    it('is ignored while a cycle is in flight', async () => {
      const { source, settle } = deferredSource();
      scheduler = new RefreshScheduler(source, { refreshOnStart: false });
      const onSnapshot = vi.fn();
      scheduler.subscribe({ onSnapshot });

      const first = scheduler.triggerManualRefresh();
      const second = await scheduler.triggerManualRefresh();
      settle(okResult());
      await first;

      expect(second).toBeNull();
      expect(source.collect).toHaveBeenCalledTimes(1);
      expect(onSnapshot).toHaveBeenCalledTimes(1);
    });

    it('reports the collecting phase until the cycle settles', async () => {
      const { source, settle } = deferredSource();
      scheduler = new RefreshScheduler(source, { refreshOnStart: false });

      const cycle = scheduler.triggerManualRefresh();
      expect(scheduler.getState().phase).toBe('collecting');

      settle(okResult());
      await cycle;
      expect(scheduler.getState().phase).toBe('idle');
    });
  });

  describe('timer', () => {
    it('drops fires while auto-refresh is disabled', async () => {
      const source = immediateSource(okResult());
      scheduler = new RefreshScheduler(source, { intervalMs: 1000, autoRefresh: false, refreshOnStart: false });

      scheduler.start();
      await vi.advanceTimersByTimeAsync(5000);

      expect(source.collect).not.toHaveBeenCalled();
      expect(scheduler.getState()).toEqual({ phase: 'idle', autoRefresh: false, started: true, intervalMs: 1000 });
    });

    it('collects on every fire while enabled', async () => {
      const source = immediateSource(okResult());
      scheduler = new RefreshScheduler(source, { intervalMs: 1000, refreshOnStart: false });

      scheduler.start();
      await vi.advanceTimersByTimeAsync(3000);

      expect(source.collect).toHaveBeenCalledTimes(3);
    });

    it('drops fires that arrive during a cycle instead of queueing them', async () => {
      const { source, settle } = deferredSource();
      scheduler = new RefreshScheduler(source, { intervalMs: 1000 });

      const startup = nextResult(scheduler);
      scheduler.start();
      await vi.advanceTimersByTimeAsync(3500);
      expect(source.collect).toHaveBeenCalledTimes(1);

      settle(okResult());
      await startup;
      await vi.advanceTimersByTimeAsync(500);

      expect(source.collect).toHaveBeenCalledTimes(2);
    });

    it('stop disarms the timer', async () => {
      const source = immediateSource(okResult());
      scheduler = new RefreshScheduler(source, { intervalMs: 1000, refreshOnStart: false });

      scheduler.start();
      scheduler.stop();
      await vi.advanceTimersByTimeAsync(5000);

      expect(source.collect).not.toHaveBeenCalled();
      expect(scheduler.getState().started).toBe(false);
    });

    it('start runs a startup cycle when refreshOnStart is set', async () => {
      const source = immediateSource(okResult());
      scheduler = new RefreshScheduler(source, { intervalMs: 60_000 });
      const onResult = vi.fn();
      scheduler.subscribe({ onResult });

      const startup = nextResult(scheduler);
      scheduler.start();
      await startup;

      expect(onResult).toHaveBeenCalledWith(expect.objectContaining({ ok: true }), 'startup');
    });

    it('setIntervalMs re-arms a running timer', async () => {
      const source = immediateSource(okResult());
      scheduler = new RefreshScheduler(source, { intervalMs: 5000, refreshOnStart: false });

      scheduler.start();
      scheduler.setIntervalMs(2000);
      await vi.advanceTimersByTimeAsync(2000);

      expect(source.collect).toHaveBeenCalledTimes(1);
      expect(scheduler.getState().intervalMs).toBe(2000);
    });

    it('setIntervalMs rejects a non-positive interval', () => {
      scheduler = new RefreshScheduler(immediateSource(okResult()), { refreshOnStart: false });

      expect(() => scheduler?.setIntervalMs(0)).toThrow(TelemetryError);
      const error = (() => {
        try {
          scheduler?.setIntervalMs(-1);
        } catch (e) {
          return e;
        }
        return null;
      })();
      expect(error).toMatchObject({ code: ErrorCode.INVALID_STATE });
      expect(scheduler.getState().intervalMs).toBe(5000);
    });
  });

  describe('auto-refresh toggle', () => {
    it('flips the flag without starting a cycle', () => {
      const source = immediateSource(okResult());
      scheduler = new RefreshScheduler(source, { refreshOnStart: false });
      const onStateChange = vi.fn();
      scheduler.subscribe({ onStateChange });

      expect(scheduler.toggleAutoRefresh()).toBe(false);
      expect(scheduler.isAutoRefreshEnabled()).toBe(false);
      expect(scheduler.toggleAutoRefresh()).toBe(true);

      expect(source.collect).not.toHaveBeenCalled();
      expect(onStateChange).toHaveBeenNthCalledWith(1, expect.objectContaining({ autoRefresh: false }));
    });

    it('does not abort a cycle in flight', async () => {
      const { source, settle } = deferredSource();
      scheduler = new RefreshScheduler(source, { refreshOnStart: false });

      const cycle = scheduler.triggerManualRefresh();
      scheduler.toggleAutoRefresh();
      settle(okResult());

      expect((await cycle)?.ok).toBe(true);
      expect(scheduler.getLastSnapshot()).not.toBeNull();
    });
  });

  describe('failures', () => {
    it('keeps the last good snapshot when a later cycle fails', async () => {
      const source = immediateSource(okResult('2026-10-19T12:00:00.000Z'), failedResult());
      scheduler = new RefreshScheduler(source, { refreshOnStart: false });
      const onFailure = vi.fn();
      scheduler.subscribe({ onFailure });

      await scheduler.triggerManualRefresh();
      const failed = await scheduler.triggerManualRefresh();

      expect(failed?.ok).toBe(false);
      expect(scheduler.getLastSnapshot()?.timestamp).toBe('2026-10-19T12:00:00.000Z');
      expect(scheduler.getLastResult()).toBe(failed);
      expect(onFailure).toHaveBeenCalledWith(expect.objectContaining({ category: 'network' }));
    });

    it('survives a source that throws', async () => {
      const source = { collect: vi.fn(async (): Promise<CollectionResult> => Promise.reject(new Error('boom'))) };
      scheduler = new RefreshScheduler(source, { refreshOnStart: false });

      await expect(scheduler.triggerManualRefresh()).resolves.toBeNull();
      expect(scheduler.getState().phase).toBe('idle');
      expect(scheduler.getLastResult()).toBeNull();
    });

    it('isolates a throwing listener from the others', async () => {
      scheduler = new RefreshScheduler(immediateSource(okResult()), { refreshOnStart: false });
      const healthy = vi.fn();
      scheduler.subscribe({
        onSnapshot: () => {
          throw new Error('listener exploded');
        },
      });
      scheduler.subscribe({ onSnapshot: healthy });

      const result = await scheduler.triggerManualRefresh();

      expect(result?.ok).toBe(true);
      expect(healthy).toHaveBeenCalledTimes(1);
    });
  });

  describe('subscriptions and shutdown', () => {
    it('stops notifying after unsubscribe', async () => {
      scheduler = new RefreshScheduler(immediateSource(okResult()), { refreshOnStart: false });
      const onSnapshot = vi.fn();
      const unsubscribe = scheduler.subscribe({ onSnapshot });

      unsubscribe();
      await scheduler.triggerManualRefresh();

      expect(onSnapshot).not.toHaveBeenCalled();
    });

    it('shutdown waits for the cycle in flight', async () => {
      const { source, settle } = deferredSource();
      const local = new RefreshScheduler(source, { refreshOnStart: false });
      local.start();
      const cycle = local.triggerManualRefresh();

      let done = false;
      const shutdown = local.shutdown().then(() => {
        done = true;
      });
      await Promise.resolve();
      expect(done).toBe(false);

      settle(okResult());
      await cycle;
      await shutdown;
      expect(done).toBe(true);
      expect(local.getState().started).toBe(false);
    });
  });
});
