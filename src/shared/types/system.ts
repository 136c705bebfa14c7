/**
 * Telemetry snapshot types, shared by the collection pipeline, the scheduler
 * and the presentation adapters.
 *
 * Every record is read-only; an assembled snapshot is also frozen at runtime.
 */

export type TelemetryCategory = 'platform' | 'network' | 'hardware' | 'process';

// ─── Platform ───

export interface PlatformInfo {
  readonly system: string;
  readonly release: string;
  readonly version: string;
  readonly machine: string;
  readonly processor: string;
  /** [bits, linkage], e.g. ['64bit', 'ELF'] */
  readonly architecture: readonly [string, string];
  readonly runtimeVersion: string;
}

// ─── Network ───

export type AddressFamily = 'IPv4' | 'IPv6' | 'link';

export interface NetworkAddress {
  readonly address: string;
  readonly netmask: string | null;
  readonly family: AddressFamily;
}

export interface NetworkInfo {
  readonly hostname: string;
  readonly ipAddress: string;
  /** Lower-case, colon-separated, big-endian octets */
  readonly macAddress: string;
  /** Keyed by interface name; address order follows OS enumeration */
  readonly interfaces: Readonly<Record<string, ReadonlyArray<NetworkAddress>>>;
}

// ─── Hardware ───

/** MHz */
export interface CpuFrequency {
  readonly current: number;
  readonly min: number;
  readonly max: number;
}

export interface CpuInfo {
  readonly physicalCores: number | null;
  readonly logicalCores: number;
  readonly frequency: CpuFrequency | null;
  readonly usagePercent: number;
}

export interface MemoryInfo {
  readonly total: number;
  readonly available: number;
  readonly used: number;
  readonly percent: number;
}

export interface DiskInfo {
  readonly mountpoint: string;
  readonly filesystem: string;
  readonly total: number;
  readonly used: number;
  readonly free: number;
  readonly percent: number;
}

export interface HardwareInfo {
  readonly cpu: CpuInfo;
  readonly memory: MemoryInfo;
  /** Keyed by device; unreadable devices are absent */
  readonly disks: Readonly<Record<string, DiskInfo>>;
}

// ─── Processes ───

export interface ProcessInfo {
  readonly pid: number;
  readonly name: string;
  readonly username: string;
  readonly memoryPercent: number;
}

export interface ProcessSnapshot {
  /** Counted in its own pass; may differ from runningProcesses.length */
  readonly totalProcesses: number;
  readonly runningProcesses: ReadonlyArray<ProcessInfo>;
}

// ─── Snapshot ───

export interface SnapshotParts {
  readonly platform: PlatformInfo;
  readonly network: NetworkInfo;
  readonly hardware: HardwareInfo;
  readonly process: ProcessSnapshot;
}

export interface SystemSnapshot extends SnapshotParts {
  /** ISO-8601 capture instant */
  readonly timestamp: string;
}

// ─── Cycle outcome ───

export interface CollectionFailure {
  readonly category: TelemetryCategory;
  readonly code: string;
  readonly message: string;
  readonly occurredAt: string;
}

export type CollectionResult =
  | { readonly ok: true; readonly cycleId: string; readonly snapshot: SystemSnapshot }
  | { readonly ok: false; readonly cycleId: string; readonly failure: CollectionFailure };
