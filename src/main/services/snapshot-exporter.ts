/**
 * SnapshotExporter: one-shot JSON export of a collection result.
 *
 * The document uses the flat snake_case layout of system_data.json so that
 * existing consumers of that file keep working. Writes are atomic
 * (temp file + rename).
 */

import * as fsp from 'fs/promises';
import * as path from 'path';
import type { CollectionResult, SystemSnapshot } from '../../shared/types/system';
import { ErrorCode, TelemetryError } from '../../shared/types/errors';
import { createLogger } from './logger';

const log = createLogger('SnapshotExporter');

export const DEFAULT_EXPORT_PATH = 'system_data.json';

export interface SnapshotDocument {
  timestamp: string;
  platform: {
    system: string;
    release: string;
    version: string;
    machine: string;
    processor: string;
    architecture: [string, string];
    runtime_version: string;
  };
  network: {
    hostname: string;
    ip_address: string;
    mac_address: string;
    network_interfaces: Record<string, { address: string; netmask: string | null; family: string }[]>;
  };
  hardware: {
    cpu: {
      physical_cores: number | null;
      total_cores: number;
      max_frequency: { current: number; min: number; max: number } | null;
      current_usage: number;
    };
    memory: { total: number; available: number; used: number; percent: number };
    disk: Record<
      string,
      { mountpoint: string; filesystem: string; total: number; used: number; free: number; percent: number }
    >;
  };
  process: {
    total_processes: number;
    running_processes: { pid: number; name: string; username: string; memory_percent: number }[];
  };
}

export type ExportDocument = SnapshotDocument | { error: string };

function mapValues<T, U>(record: Readonly<Record<string, T>>, fn: (value: T) => U): Record<string, U> {
  const out: Record<string, U> = {};
  for (const [key, value] of Object.entries(record)) out[key] = fn(value);
  return out;
}

export function toSnapshotDocument(snapshot: SystemSnapshot): SnapshotDocument {
  const { platform, network, hardware, process } = snapshot;
  return {
    timestamp: snapshot.timestamp,
    platform: {
      system: platform.system,
      release: platform.release,
      version: platform.version,
      machine: platform.machine,
      processor: platform.processor,
      architecture: [platform.architecture[0], platform.architecture[1]],
      runtime_version: platform.runtimeVersion,
    },
    network: {
      hostname: network.hostname,
      ip_address: network.ipAddress,
      mac_address: network.macAddress,
      network_interfaces: mapValues(network.interfaces, (addrs) => addrs.map((addr) => ({ ...addr }))),
    },
    hardware: {
      cpu: {
        physical_cores: hardware.cpu.physicalCores,
        total_cores: hardware.cpu.logicalCores,
        max_frequency: hardware.cpu.frequency ? { ...hardware.cpu.frequency } : null,
        current_usage: hardware.cpu.usagePercent,
      },
      memory: { ...hardware.memory },
      disk: mapValues(hardware.disks, (disk) => ({ ...disk })),
    },
    process: {
      total_processes: process.totalProcesses,
      running_processes: process.runningProcesses.map((p) => ({
        pid: p.pid,
        name: p.name,
        username: p.username,
        memory_percent: p.memoryPercent,
      })),
    },
  };
}

export function toExportDocument(result: CollectionResult): ExportDocument {
  if (result.ok) return toSnapshotDocument(result.snapshot);
  return { error: `Failed to collect system data: ${result.failure.message}` };
}

export class SnapshotExporter {
  constructor(private readonly defaultPath: string = DEFAULT_EXPORT_PATH) {}

  /** Returns the absolute path written */
  async exportResult(result: CollectionResult, filePath: string = this.defaultPath): Promise<string> {
    const target = path.resolve(filePath);
    const tmpPath = `${target}.tmp`;
    try {
      await fsp.mkdir(path.dirname(target), { recursive: true });
      await fsp.writeFile(tmpPath, JSON.stringify(toExportDocument(result), null, 4), 'utf8');
      await fsp.rename(tmpPath, target);
    } catch (error) {
      throw new TelemetryError(`Failed to write export to ${target}`, ErrorCode.EXPORT_WRITE_ERROR, {
        originalError: error instanceof Error ? error : undefined,
        context: { path: target },
      });
    }
    log.info(`Exported ${result.ok ? 'snapshot' : 'failure'} to ${target}`);
    return target;
  }
}
