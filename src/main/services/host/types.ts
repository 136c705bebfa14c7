/**
 * Host sources: the OS queries each category collector depends on.
 *
 * Collectors only see these interfaces; `createHostSources()` wires the real
 * implementations and tests hand in fakes.
 */

import type { CpuFrequency, PlatformInfo } from '../../../shared/types/system';

export interface PlatformSource {
  identity(): PlatformInfo;
}

export interface NetworkSource {
  hostname(): string;
  resolveAddress(hostname: string): Promise<string>;
  /** 48-bit hardware node identifier */
  nodeIdentifier(): number;
  /** Raw interface table; entries are validated by the collector */
  interfaces(): Readonly<Record<string, ReadonlyArray<unknown> | undefined>>;
}

export interface CpuTimes {
  idle: number;
  total: number;
}

export interface MemoryStats {
  total: number;
  available: number;
}

export interface PartitionEntry {
  device: string;
  mountpoint: string;
  filesystem: string;
}

export interface DiskUsage {
  total: number;
  used: number;
  free: number;
}

export interface HardwareSource {
  logicalCores(): number;
  physicalCores(): Promise<number | null>;
  cpuFrequency(): Promise<CpuFrequency>;
  cpuTimes(): CpuTimes;
  memory(): Promise<MemoryStats>;
  partitions(): Promise<PartitionEntry[]>;
  diskUsage(mountpoint: string): Promise<DiskUsage>;
}

export interface RawProcess {
  pid: number;
  name: string;
  /** null when the owner could not be read */
  username: string | null;
  memoryPercent: number;
  zombie: boolean;
}

/** One enumerated process; reading it may fail if it has exited meanwhile. */
export interface ProcessHandle {
  pid: number;
  read(): Promise<RawProcess>;
}

export interface ProcessSource {
  /** Cheap PID-only pass used for the total count */
  listPids(): Promise<number[]>;
  /** Detail pass; handles are read one by one */
  enumerate(): Promise<ProcessHandle[]>;
}

export interface HostSources {
  platform: PlatformSource;
  network: NetworkSource;
  hardware: HardwareSource;
  processes: ProcessSource;
}
