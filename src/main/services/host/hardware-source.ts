import * as os from 'os';
import * as fsp from 'fs/promises';
import type { CpuFrequency } from '../../../shared/types/system';
import { createLogger } from '../logger';
import { execCommand, powershell } from './exec-command';
import { parseCpuinfoPhysicalCores, parseCsv, parseMeminfo, parseMountOutput, parseProcMounts } from './parsers';
import type { CpuTimes, DiskUsage, HardwareSource, MemoryStats, PartitionEntry } from './types';

const log = createLogger('HardwareSource');

const CPUFREQ_DIR = '/sys/devices/system/cpu/cpu0/cpufreq';

async function readKhzAsMhz(file: string): Promise<number> {
  const khz = parseInt(await fsp.readFile(file, 'utf8'), 10);
  if (!Number.isFinite(khz)) throw new Error(`Unreadable frequency in ${file}`);
  return khz / 1000;
}

export class OsHardwareSource implements HardwareSource {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  logicalCores(): number {
    return os.cpus().length;
  }

  async physicalCores(): Promise<number | null> {
    if (this.platform === 'linux') {
      return parseCpuinfoPhysicalCores(await fsp.readFile('/proc/cpuinfo', 'utf8'));
    }
    if (this.platform === 'win32') {
      const output = await powershell(
        '(Get-CimInstance Win32_Processor | Measure-Object -Property NumberOfCores -Sum).Sum',
      );
      const cores = parseInt(output.trim(), 10);
      return Number.isFinite(cores) ? cores : null;
    }
    const cores = parseInt((await execCommand('sysctl -n hw.physicalcpu')).trim(), 10);
    return Number.isFinite(cores) ? cores : null;
  }

  /**
   * Current speed averaged over all cores. Linux reports min/max through
   * cpufreq; elsewhere min is 0 and max is the fastest core's speed.
   */
  async cpuFrequency(): Promise<CpuFrequency> {
    const speeds = os.cpus().map((cpu) => cpu.speed);
    const current = speeds.length > 0 ? speeds.reduce((a, b) => a + b, 0) / speeds.length : 0;
    if (current <= 0) {
      throw new Error('CPU frequency not reported');
    }

    if (this.platform === 'linux') {
      try {
        const [min, max] = await Promise.all([
          readKhzAsMhz(`${CPUFREQ_DIR}/cpuinfo_min_freq`),
          readKhzAsMhz(`${CPUFREQ_DIR}/cpuinfo_max_freq`),
        ]);
        return { current, min, max };
      } catch (err) {
        // No cpufreq driver (VMs, containers): fall through to the reported speeds
        log.debug('cpufreq unavailable:', err);
      }
    }
    return { current, min: 0, max: Math.max(...speeds) };
  }

  cpuTimes(): CpuTimes {
    let idle = 0;
    let total = 0;
    for (const cpu of os.cpus()) {
      idle += cpu.times.idle;
      total += cpu.times.user + cpu.times.nice + cpu.times.sys + cpu.times.idle + cpu.times.irq;
    }
    return { idle, total };
  }

  /** MemAvailable on Linux (includes reclaimable cache), free memory elsewhere */
  async memory(): Promise<MemoryStats> {
    const total = os.totalmem();
    if (this.platform === 'linux') {
      const available = parseMeminfo(await fsp.readFile('/proc/meminfo', 'utf8')).get('MemAvailable');
      if (available !== undefined) return { total, available };
    }
    return { total, available: os.freemem() };
  }

  async partitions(): Promise<PartitionEntry[]> {
    if (this.platform === 'linux') {
      return parseProcMounts(await fsp.readFile('/proc/mounts', 'utf8'));
    }
    if (this.platform === 'win32') {
      const output = await powershell(
        'Get-CimInstance Win32_LogicalDisk | Select-Object DeviceID,FileSystem | ConvertTo-Csv -NoTypeInformation',
      );
      return parseCsv(output)
        .filter((row) => row.DeviceID)
        .map((row) => ({ device: row.DeviceID, mountpoint: `${row.DeviceID}\\`, filesystem: row.FileSystem }));
    }
    return parseMountOutput(await execCommand('mount'));
  }

  /**
   * used/free follow statvfs: free is what an unprivileged user can still
   * write. Pseudo filesystems report zero blocks and come out as all zeros.
   */
  async diskUsage(mountpoint: string): Promise<DiskUsage> {
    const stats = await fsp.statfs(mountpoint);
    return {
      total: stats.blocks * stats.bsize,
      used: (stats.blocks - stats.bfree) * stats.bsize,
      free: stats.bavail * stats.bsize,
    };
  }
}
