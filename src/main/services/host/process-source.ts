import * as os from 'os';
import * as fsp from 'fs/promises';
import { ErrorCode, TelemetryError } from '../../../shared/types/errors';
import { createLogger } from '../logger';
import { execCommand, powershell } from './exec-command';
import { parseCsv, parsePasswd, parsePidList, parseProcStat, parseProcStatus, parsePsRow } from './parsers';
import type { ProcessHandle, ProcessSource, RawProcess } from './types';

const log = createLogger('ProcessSource');

function malformed(what: string): TelemetryError {
  return new TelemetryError(`Malformed process entry: ${what}`, ErrorCode.MALFORMED_ENTRY);
}

function percentOf(bytes: number, total: number): number {
  return total > 0 ? (bytes / total) * 100 : 0;
}

// ─── Linux: procfs ───

export class ProcfsProcessSource implements ProcessSource {
  constructor(private readonly procRoot = '/proc') {}

  async listPids(): Promise<number[]> {
    const entries = await fsp.readdir(this.procRoot);
    return entries.filter((name) => /^\d+$/.test(name)).map((name) => parseInt(name, 10));
  }

  async enumerate(): Promise<ProcessHandle[]> {
    const pids = await this.listPids();
    const users = await this.loadUsers();
    const totalMemory = os.totalmem();
    return pids.map((pid) => ({ pid, read: () => this.readProcess(pid, users, totalMemory) }));
  }

  private async readProcess(pid: number, users: Map<number, string>, totalMemory: number): Promise<RawProcess> {
    const [statText, statusText] = await Promise.all([
      fsp.readFile(`${this.procRoot}/${pid}/stat`, 'utf8'),
      fsp.readFile(`${this.procRoot}/${pid}/status`, 'utf8'),
    ]);
    const stat = parseProcStat(statText);
    if (!stat) throw malformed(`${this.procRoot}/${pid}/stat`);

    const { uid, rssBytes } = parseProcStatus(statusText);
    return {
      pid,
      name: stat.name,
      username: uid === null ? null : users.get(uid) ?? String(uid),
      memoryPercent: percentOf(rssBytes, totalMemory),
      zombie: stat.state === 'Z',
    };
  }

  private async loadUsers(): Promise<Map<number, string>> {
    try {
      return parsePasswd(await fsp.readFile('/etc/passwd', 'utf8'));
    } catch (err) {
      log.debug('Cannot read /etc/passwd, usernames fall back to UIDs:', err);
      return new Map();
    }
  }
}

// ─── macOS / BSD: ps ───

export class PsProcessSource implements ProcessSource {
  async listPids(): Promise<number[]> {
    return parsePidList(await execCommand('ps -A -o pid='));
  }

  async enumerate(): Promise<ProcessHandle[]> {
    const output = await execCommand('ps -A -o pid=,stat=,rss=,user=,comm=');
    const totalMemory = os.totalmem();
    return output
      .split('\n')
      .filter((line) => line.trim())
      .map((line) => {
        const row = parsePsRow(line);
        return {
          pid: row?.pid ?? -1,
          read: async (): Promise<RawProcess> => {
            if (!row) throw malformed(line.trim());
            return {
              pid: row.pid,
              name: row.name,
              username: row.user,
              memoryPercent: percentOf(row.rssBytes, totalMemory),
              zombie: row.stat.startsWith('Z'),
            };
          },
        };
      });
  }
}

// ─── Windows: Get-Process ───

export class WindowsProcessSource implements ProcessSource {
  async listPids(): Promise<number[]> {
    return parsePidList(await powershell('Get-Process | Select-Object -ExpandProperty Id'));
  }

  /** Owner lookup needs elevation on Windows, so username stays unknown */
  async enumerate(): Promise<ProcessHandle[]> {
    const output = await powershell(
      'Get-Process | Select-Object Id,ProcessName,WorkingSet64 | ConvertTo-Csv -NoTypeInformation',
    );
    const totalMemory = os.totalmem();
    return parseCsv(output).map((row) => {
      const pid = parseInt(row.Id, 10);
      const workingSet = parseInt(row.WorkingSet64, 10);
      return {
        pid,
        read: async (): Promise<RawProcess> => {
          if (!Number.isFinite(pid) || !row.ProcessName) throw malformed(JSON.stringify(row));
          return {
            pid,
            name: row.ProcessName,
            username: null,
            memoryPercent: percentOf(Number.isFinite(workingSet) ? workingSet : 0, totalMemory),
            zombie: false,
          };
        },
      };
    });
  }
}
