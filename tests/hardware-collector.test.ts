import { describe, it, expect, vi } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import {
  HardwareCollector,
  cpuUsageBetween,
  toDiskInfo,
  toMemoryInfo,
} from '../src/main/services/collectors/hardware-collector';
import { CollectorError, ErrorCode } from '../src/shared/types/errors';
import { errnoError, fakeHardwareSource } from './helpers/fake-host';

const noWait = () => Promise.resolve();

describe('pure helpers', () => {
  it('cpuUsageBetween computes the busy share of the window', () => {
    expect(cpuUsageBetween({ idle: 900, total: 1000 }, { idle: 958, total: 1100 })).toBe(42);
  });

  it('cpuUsageBetween returns 0 when no time elapsed', () => {
    expect(cpuUsageBetween({ idle: 5, total: 10 }, { idle: 5, total: 10 })).toBe(0);
  });

  it('toMemoryInfo derives used and percent from available', () => {
    expect(toMemoryInfo({ total: 16_000_000_000, available: 8_000_000_000 })).toEqual({
      total: 16_000_000_000,
      available: 8_000_000_000,
      used: 8_000_000_000,
      percent: 50,
    });
  });

  it('toDiskInfo measures against the space available to users', () => {
    // 60 used of 60 + 20 usable → 75%
    expect(toDiskInfo('/data', 'xfs', { total: 100, used: 60, free: 20 }).percent).toBe(75);
  });
});

describe('HardwareCollector', () => {
  it('collects cpu, memory and disks', async () => {
    const hardware = await new HardwareCollector(fakeHardwareSource(), { sleep: noWait }).collect();

    expect(hardware.cpu).toEqual({
      physicalCores: 4,
      logicalCores: 8,
      frequency: { current: 2400, min: 800, max: 4200 },
      usagePercent: 42,
    });
    expect(hardware.memory.percent).toBe(50);
    expect(hardware.disks).toEqual({
      '/dev/sda1': {
        mountpoint: '/',
        filesystem: 'ext4',
        total: 100_000_000_000,
        used: 55_000_000_000,
        free: 45_000_000_000,
        percent: 55,
      },
    });
  });

  it('waits the configured sample window between the two CPU samples', async () => {
    const sleep = vi.fn(noWait);
    const source = fakeHardwareSource();

    await new HardwareCollector(source, { cpuSampleMs: 250, sleep }).collect();

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(250);
    expect(source.cpuTimes).toHaveBeenCalledTimes(2);
  });

  it('reports frequency and physical cores as null when unavailable', async () => {
    const source = fakeHardwareSource();
    vi.mocked(source.cpuFrequency).mockRejectedValue(new Error('CPU frequency not reported'));
    vi.mocked(source.physicalCores).mockRejectedValue(errnoError('ENOENT'));

    const hardware = await new HardwareCollector(source, { sleep: noWait }).collect();

    expect(hardware.cpu.frequency).toBeNull();
    expect(hardware.cpu.physicalCores).toBeNull();
    expect(hardware.cpu.logicalCores).toBe(8);
  });

  it('omits exactly the disk whose usage cannot be read', async () => {
    const partitions = [
      { device: '/dev/sda1', mountpoint: '/', filesystem: 'ext4' },
      { device: '/dev/sdb1', mountpoint: '/data', filesystem: 'xfs' },
      { device: '/dev/sdc1', mountpoint: '/backup', filesystem: 'ext4' },
    ];
    const usage = { total: 1000, used: 400, free: 600 };
    const healthy = fakeHardwareSource({ partitions, usage: { '/': usage, '/data': usage, '/backup': usage } });
    const degraded = fakeHardwareSource({
      partitions,
      usage: { '/': usage, '/data': errnoError('EACCES'), '/backup': usage },
    });

    const all = (await new HardwareCollector(healthy, { sleep: noWait }).collect()).disks;
    const some = (await new HardwareCollector(degraded, { sleep: noWait }).collect()).disks;

    expect(Object.keys(all)).toHaveLength(3);
    expect(Object.keys(some)).toEqual(['/dev/sda1', '/dev/sdc1']);
    expect(some['/dev/sda1']).toEqual(all['/dev/sda1']);
    expect(some['/dev/sdc1']).toEqual(all['/dev/sdc1']);
  });

  it('escalates a partition listing failure', async () => {
    const source = fakeHardwareSource();
    vi.mocked(source.partitions).mockRejectedValue(errnoError('EACCES', 'EACCES: /proc/mounts'));

    const error = await new HardwareCollector(source, { sleep: noWait }).collect().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollectorError);
    expect(error).toMatchObject({ category: 'hardware', code: ErrorCode.HARDWARE_QUERY_ERROR });
  });
});
