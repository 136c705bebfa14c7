import type { CpuFrequency, CpuInfo, DiskInfo, HardwareInfo, MemoryInfo } from '../../../shared/types/system';
import { CollectorError } from '../../../shared/types/errors';
import { createLogger } from '../logger';
import type { CpuTimes, DiskUsage, HardwareSource, MemoryStats } from '../host/types';
import { attempt, OmissionTally } from './omission';

const log = createLogger('HardwareCollector');

export const DEFAULT_CPU_SAMPLE_MS = 1000;

export interface HardwareCollectorOptions {
  /** Blocking wait between the two CPU-time samples */
  cpuSampleMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Busy share of the interval between two cumulative CPU-time samples */
export function cpuUsageBetween(before: CpuTimes, after: CpuTimes): number {
  const totalDelta = after.total - before.total;
  if (totalDelta <= 0) return 0;
  const busy = 1 - (after.idle - before.idle) / totalDelta;
  return round1(Math.min(100, Math.max(0, busy * 100)));
}

export function toMemoryInfo(stats: MemoryStats): MemoryInfo {
  const used = stats.total - stats.available;
  return {
    total: stats.total,
    available: stats.available,
    used,
    percent: stats.total > 0 ? round1((used / stats.total) * 100) : 0,
  };
}

/** Percent of the space usable by unprivileged users, as df reports it */
export function toDiskInfo(mountpoint: string, filesystem: string, usage: DiskUsage): DiskInfo {
  const usable = usage.used + usage.free;
  return {
    mountpoint,
    filesystem,
    total: usage.total,
    used: usage.used,
    free: usage.free,
    percent: usable > 0 ? round1((usage.used / usable) * 100) : 0,
  };
}

export class HardwareCollector {
  private readonly cpuSampleMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: HardwareSource,
    options: HardwareCollectorOptions = {},
  ) {
    this.cpuSampleMs = options.cpuSampleMs ?? DEFAULT_CPU_SAMPLE_MS;
    this.sleep = options.sleep ?? delay;
  }

  async collect(): Promise<HardwareInfo> {
    try {
      const cpu = await this.collectCpu();
      const memory = toMemoryInfo(await this.source.memory());
      const disks = await this.collectDisks();
      return { cpu, memory, disks };
    } catch (error) {
      throw CollectorError.wrap('hardware', error);
    }
  }

  private async collectCpu(): Promise<CpuInfo> {
    const logicalCores = this.source.logicalCores();

    let physicalCores: number | null = null;
    try {
      physicalCores = await this.source.physicalCores();
    } catch (err) {
      log.debug('Physical core count unavailable:', err);
    }

    let frequency: CpuFrequency | null = null;
    try {
      frequency = await this.source.cpuFrequency();
    } catch (err) {
      log.debug('CPU frequency unavailable:', err);
    }

    return { physicalCores, logicalCores, frequency, usagePercent: await this.sampleCpuUsage() };
  }

  /** The one deliberate blocking point of a cycle */
  private async sampleCpuUsage(): Promise<number> {
    const before = this.source.cpuTimes();
    await this.sleep(this.cpuSampleMs);
    return cpuUsageBetween(before, this.source.cpuTimes());
  }

  private async collectDisks(): Promise<Record<string, DiskInfo>> {
    const partitions = await this.source.partitions();
    const disks: Record<string, DiskInfo> = {};
    const skipped = new OmissionTally();

    for (const partition of partitions) {
      const usage = await attempt(() => this.source.diskUsage(partition.mountpoint));
      if (!usage.ok) {
        skipped.add(usage.reason);
        log.debug(`Skipping ${partition.device} (${partition.mountpoint}): ${usage.detail}`);
        continue;
      }
      disks[partition.device] = toDiskInfo(partition.mountpoint, partition.filesystem, usage.value);
    }

    skipped.report(log, 'disks');
    return disks;
  }
}
