import { describe, it, expect, vi, beforeEach } from 'vitest';

const log = vi.hoisted(() => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }));

vi.mock('../src/main/services/logger', () => ({
  createLogger: () => log,
}));

import { ConsolePresenter, formatSnapshotSummary } from '../src/main/services/console-presenter';
import { RefreshScheduler } from '../src/main/services/refresh-scheduler';
import type { CollectionResult } from '../src/shared/types/system';
import { failedResult, makeSnapshot, okResult } from './helpers/fake-host';

describe('formatSnapshotSummary', () => {
  it('renders one line per section with processes by memory share', () => {
    expect(formatSnapshotSummary(makeSnapshot(), 20)).toEqual([
      'Last update: 2026-10-19T12:00:00.000Z',
      'OS: Linux 6.1.0-test (x86_64) | Node.js v20.0.0',
      'CPU: 42.0% | 4 physical / 8 logical @ 2400 MHz',
      'Memory: 8.0/16.0 GB (50.0%)',
      'Network: test-host 192.168.1.10 [0a:1b:2c:3d:4e:5f]',
      'Disk /dev/sda1 on / (ext4): 55.0% of 100.0 GB',
      'Processes: 2 listed / 3 total',
      '      200   1.5%  -  bash',
      '        1   0.5%  root  init',
    ]);
  });

  it('limits the process table to topN', () => {
    const lines = formatSnapshotSummary(makeSnapshot(), 1);

    expect(lines.slice(-2)).toEqual(['Processes: 2 listed / 3 total', '      200   1.5%  -  bash']);
  });

  it('marks unknown CPU details', () => {
    const snapshot = makeSnapshot();
    const lines = formatSnapshotSummary(
      { ...snapshot, hardware: { ...snapshot.hardware, cpu: { ...snapshot.hardware.cpu, physicalCores: null, frequency: null } } },
      20,
    );

    expect(lines[2]).toBe('CPU: 42.0% | ? physical / 8 logical');
  });
});

describe('ConsolePresenter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  function setup(...results: CollectionResult[]) {
    let i = 0;
    const scheduler = new RefreshScheduler(
      { collect: async () => results[Math.min(i++, results.length - 1)] },
      { refreshOnStart: false },
    );
    const presenter = new ConsolePresenter(scheduler, 20);
    presenter.attach();
    return { scheduler, presenter };
  }

  it('logs each snapshot summary', async () => {
    const { scheduler } = setup(okResult());

    await scheduler.triggerManualRefresh();

    expect(log.info).toHaveBeenCalledWith(`\n${formatSnapshotSummary(makeSnapshot(), 20).join('\n')}`);
  });

  it('warns about a failure and names the data still shown', async () => {
    const { scheduler } = setup(okResult('2026-10-19T12:00:00.000Z'), failedResult('network collector failed: boom'));

    await scheduler.triggerManualRefresh();
    await scheduler.triggerManualRefresh();

    expect(log.warn).toHaveBeenCalledWith(
      'Error refreshing data: network collector failed: boom (showing data from 2026-10-19T12:00:00.000Z)',
    );
  });

  it('warns without a fallback when nothing was collected yet', async () => {
    const { scheduler } = setup(failedResult('process collector failed: EACCES'));

    await scheduler.triggerManualRefresh();

    expect(log.warn).toHaveBeenCalledWith('Error refreshing data: process collector failed: EACCES');
  });

  it('logs auto-refresh changes once per change', () => {
    const { scheduler } = setup(okResult());

    scheduler.toggleAutoRefresh();
    scheduler.setIntervalMs(1000);
    scheduler.toggleAutoRefresh();

    const shown = log.info.mock.calls.map(([message]) => String(message)).filter((m) => m.startsWith('Auto-refresh:'));
    expect(shown).toEqual(['Auto-refresh: OFF (press t to toggle)', 'Auto-refresh: ON (press t to toggle)']);
  });

  it('stops logging after detach', async () => {
    const { scheduler, presenter } = setup(okResult());

    presenter.detach();
    await scheduler.triggerManualRefresh();

    expect(log.info).not.toHaveBeenCalled();
  });
});
