import { OsHardwareSource } from './hardware-source';
import { OsNetworkSource } from './network-source';
import { OsPlatformSource } from './platform-source';
import { ProcfsProcessSource, PsProcessSource, WindowsProcessSource } from './process-source';
import type { HostSources, ProcessSource } from './types';

export type { HostSources } from './types';

function createProcessSource(platform: NodeJS.Platform): ProcessSource {
  if (platform === 'linux') return new ProcfsProcessSource();
  if (platform === 'win32') return new WindowsProcessSource();
  return new PsProcessSource();
}

/** Real OS-backed sources for the current platform */
export function createHostSources(platform: NodeJS.Platform = process.platform): HostSources {
  return {
    platform: new OsPlatformSource(),
    network: new OsNetworkSource(),
    hardware: new OsHardwareSource(platform),
    processes: createProcessSource(platform),
  };
}
