import * as os from 'os';
import type { PlatformInfo } from '../../../shared/types/system';
import type { PlatformSource } from './types';

const SYSTEM_NAMES: Record<string, string> = {
  Windows_NT: 'Windows',
};

const BINARY_FORMATS: Partial<Record<NodeJS.Platform, string>> = {
  darwin: 'Mach-O',
  win32: 'WindowsPE',
};

export class OsPlatformSource implements PlatformSource {
  identity(): PlatformInfo {
    const type = os.type();
    return {
      system: SYSTEM_NAMES[type] ?? type,
      release: os.release(),
      version: os.version(),
      machine: os.machine(),
      processor: os.cpus()[0]?.model.trim() ?? '',
      architecture: [/64/.test(process.arch) ? '64bit' : '32bit', BINARY_FORMATS[process.platform] ?? 'ELF'],
      runtimeVersion: `Node.js ${process.version}`,
    };
  }
}
